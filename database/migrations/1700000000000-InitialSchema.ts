import { MigrationInterface, QueryRunner } from "typeorm";

export class InitialSchema1700000000000 implements MigrationInterface {
    name = 'InitialSchema1700000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

        await queryRunner.query(`
            CREATE TABLE "users" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "email" character varying(255) NOT NULL,
                "password_hash" character varying(255) NOT NULL,
                "is_active" boolean NOT NULL DEFAULT true,
                "is_staff" boolean NOT NULL DEFAULT false,
                "email_verified" boolean NOT NULL DEFAULT false,
                "last_login" TIMESTAMP WITH TIME ZONE,
                "date_joined" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_users_email" UNIQUE ("email"),
                CONSTRAINT "pk_users" PRIMARY KEY ("id")
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "roles" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "name" character varying(20) NOT NULL,
                "description" text NOT NULL DEFAULT '',
                "active" boolean NOT NULL DEFAULT true,
                CONSTRAINT "uq_roles_name" UNIQUE ("name"),
                CONSTRAINT "pk_roles" PRIMARY KEY ("id")
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "user_profiles" (
                "user_id" uuid NOT NULL,
                "first_name" character varying(50) NOT NULL DEFAULT '',
                "last_name" character varying(50) NOT NULL DEFAULT '',
                "avatar" character varying(500) NOT NULL DEFAULT '',
                "phone_number" character varying(20) NOT NULL DEFAULT '',
                "country" character varying(100) NOT NULL DEFAULT '',
                "language_preference" character varying(10) NOT NULL DEFAULT 'en',
                "timezone" character varying(50) NOT NULL DEFAULT 'UTC',
                "role_id" uuid,
                CONSTRAINT "pk_user_profiles" PRIMARY KEY ("user_id"),
                CONSTRAINT "fk_user_profiles_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "fk_user_profiles_role" FOREIGN KEY ("role_id") REFERENCES "roles"("id") ON DELETE SET NULL
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "email_verification_tokens" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "user_id" uuid NOT NULL,
                "token" uuid NOT NULL,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_email_verification_tokens_user" UNIQUE ("user_id"),
                CONSTRAINT "uq_email_verification_tokens_token" UNIQUE ("token"),
                CONSTRAINT "pk_email_verification_tokens" PRIMARY KEY ("id"),
                CONSTRAINT "fk_email_verification_tokens_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "password_reset_tokens" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "user_id" uuid NOT NULL,
                "token" uuid NOT NULL,
                "used" boolean NOT NULL DEFAULT false,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_password_reset_tokens_token" UNIQUE ("token"),
                CONSTRAINT "pk_password_reset_tokens" PRIMARY KEY ("id"),
                CONSTRAINT "fk_password_reset_tokens_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "courses" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "teacher_id" uuid NOT NULL,
                "title" character varying(200) NOT NULL,
                "slug" character varying(250) NOT NULL,
                "description" text NOT NULL DEFAULT '',
                "language" character varying(5) NOT NULL DEFAULT 'en',
                "price" numeric(10,2) NOT NULL DEFAULT 0,
                "currency" character varying(3) NOT NULL DEFAULT 'USD',
                "is_free" boolean NOT NULL DEFAULT false,
                "is_published" boolean NOT NULL DEFAULT false,
                "thumbnail_url" character varying(500),
                "level" character varying(20) NOT NULL DEFAULT 'beginner',
                "duration_hours" integer NOT NULL DEFAULT 0,
                "max_students" integer,
                "prerequisites" text NOT NULL DEFAULT '',
                "learning_objectives" text NOT NULL DEFAULT '',
                "tags" character varying(500) NOT NULL DEFAULT '',
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_courses_slug" UNIQUE ("slug"),
                CONSTRAINT "pk_courses" PRIMARY KEY ("id"),
                CONSTRAINT "fk_courses_teacher" FOREIGN KEY ("teacher_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);
        await queryRunner.query(`CREATE INDEX "idx_courses_published_created" ON "courses" ("is_published", "created_at")`);

        await queryRunner.query(`
            CREATE TABLE "categories" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "title" character varying(100) NOT NULL,
                "icon_src" character varying(500),
                "description" text NOT NULL DEFAULT '',
                "is_active" boolean NOT NULL DEFAULT true,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_categories_title" UNIQUE ("title"),
                CONSTRAINT "pk_categories" PRIMARY KEY ("id")
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "course_categories" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "course_id" uuid NOT NULL,
                "category_id" uuid NOT NULL,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_course_categories_course_category" UNIQUE ("course_id", "category_id"),
                CONSTRAINT "pk_course_categories" PRIMARY KEY ("id"),
                CONSTRAINT "fk_course_categories_course" FOREIGN KEY ("course_id") REFERENCES "courses"("id") ON DELETE CASCADE,
                CONSTRAINT "fk_course_categories_category" FOREIGN KEY ("category_id") REFERENCES "categories"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "course_modules" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "course_id" uuid NOT NULL,
                "title" character varying(200) NOT NULL,
                "description" text NOT NULL DEFAULT '',
                "order" integer NOT NULL DEFAULT 0,
                "is_published" boolean NOT NULL DEFAULT false,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_course_modules_course_order" UNIQUE ("course_id", "order"),
                CONSTRAINT "pk_course_modules" PRIMARY KEY ("id"),
                CONSTRAINT "fk_course_modules_course" FOREIGN KEY ("course_id") REFERENCES "courses"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "lessons" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "module_id" uuid NOT NULL,
                "title" character varying(200) NOT NULL,
                "description" text NOT NULL DEFAULT '',
                "lesson_type" character varying(20) NOT NULL DEFAULT 'video',
                "content" text NOT NULL DEFAULT '',
                "video_url" character varying(500),
                "duration_minutes" integer NOT NULL DEFAULT 0,
                "order" integer NOT NULL DEFAULT 0,
                "is_published" boolean NOT NULL DEFAULT false,
                "is_free_preview" boolean NOT NULL DEFAULT false,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_lessons_module_order" UNIQUE ("module_id", "order"),
                CONSTRAINT "pk_lessons" PRIMARY KEY ("id"),
                CONSTRAINT "fk_lessons_module" FOREIGN KEY ("module_id") REFERENCES "course_modules"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "course_enrollments" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "student_id" uuid NOT NULL,
                "course_id" uuid NOT NULL,
                "status" character varying(20) NOT NULL DEFAULT 'enrolled',
                "is_active" boolean NOT NULL DEFAULT true,
                "progress_percentage" integer NOT NULL DEFAULT 0,
                "enrolled_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "completed_at" TIMESTAMP WITH TIME ZONE,
                "last_accessed_at" TIMESTAMP WITH TIME ZONE,
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_course_enrollments_student_course" UNIQUE ("student_id", "course_id"),
                CONSTRAINT "ck_course_enrollments_progress" CHECK ("progress_percentage" BETWEEN 0 AND 100),
                CONSTRAINT "pk_course_enrollments" PRIMARY KEY ("id"),
                CONSTRAINT "fk_course_enrollments_student" FOREIGN KEY ("student_id") REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "fk_course_enrollments_course" FOREIGN KEY ("course_id") REFERENCES "courses"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "lesson_progress" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "student_id" uuid NOT NULL,
                "lesson_id" uuid NOT NULL,
                "is_completed" boolean NOT NULL DEFAULT false,
                "completion_percentage" numeric(5,2) NOT NULL DEFAULT 0,
                "time_spent_minutes" integer NOT NULL DEFAULT 0,
                "started_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "completed_at" TIMESTAMP WITH TIME ZONE,
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_lesson_progress_student_lesson" UNIQUE ("student_id", "lesson_id"),
                CONSTRAINT "ck_lesson_progress_percentage" CHECK ("completion_percentage" BETWEEN 0 AND 100),
                CONSTRAINT "ck_lesson_progress_time" CHECK ("time_spent_minutes" >= 0),
                CONSTRAINT "pk_lesson_progress" PRIMARY KEY ("id"),
                CONSTRAINT "fk_lesson_progress_student" FOREIGN KEY ("student_id") REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "fk_lesson_progress_lesson" FOREIGN KEY ("lesson_id") REFERENCES "lessons"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE "course_reviews" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "course_id" uuid NOT NULL,
                "student_id" uuid NOT NULL,
                "rating" integer NOT NULL,
                "review_text" text NOT NULL DEFAULT '',
                "is_published" boolean NOT NULL DEFAULT true,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "uq_course_reviews_course_student" UNIQUE ("course_id", "student_id"),
                CONSTRAINT "ck_course_reviews_rating" CHECK ("rating" BETWEEN 1 AND 5),
                CONSTRAINT "pk_course_reviews" PRIMARY KEY ("id"),
                CONSTRAINT "fk_course_reviews_course" FOREIGN KEY ("course_id") REFERENCES "courses"("id") ON DELETE CASCADE,
                CONSTRAINT "fk_course_reviews_student" FOREIGN KEY ("student_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            INSERT INTO "roles" ("name", "description") VALUES
                ('Admin', 'Platform administrator'),
                ('Teacher', 'Creates and manages courses'),
                ('Student', 'Enrolls in courses')
        `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "course_reviews"`);
        await queryRunner.query(`DROP TABLE "lesson_progress"`);
        await queryRunner.query(`DROP TABLE "course_enrollments"`);
        await queryRunner.query(`DROP TABLE "lessons"`);
        await queryRunner.query(`DROP TABLE "course_modules"`);
        await queryRunner.query(`DROP TABLE "course_categories"`);
        await queryRunner.query(`DROP TABLE "categories"`);
        await queryRunner.query(`DROP INDEX "idx_courses_published_created"`);
        await queryRunner.query(`DROP TABLE "courses"`);
        await queryRunner.query(`DROP TABLE "password_reset_tokens"`);
        await queryRunner.query(`DROP TABLE "email_verification_tokens"`);
        await queryRunner.query(`DROP TABLE "user_profiles"`);
        await queryRunner.query(`DROP TABLE "roles"`);
        await queryRunner.query(`DROP TABLE "users"`);
    }
}
