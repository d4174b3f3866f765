import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
} from 'typeorm';
import { User } from '../../auth/entities/user.entity';
import { ColumnNumericTransformer } from '../../../common/utils/numeric.transformer';
import { CourseModule } from './course-module.entity';

export type CourseLevel = 'beginner' | 'intermediate' | 'advanced' | 'expert';
export type CourseCurrency = 'USD' | 'EUR' | 'GBP' | 'INR' | 'PKR';
export type CourseLanguage = 'en' | 'es' | 'fr' | 'de' | 'ur' | 'hi' | 'ar';

export const COURSE_LEVELS: readonly CourseLevel[] = ['beginner', 'intermediate', 'advanced', 'expert'];
export const COURSE_CURRENCIES: readonly CourseCurrency[] = ['USD', 'EUR', 'GBP', 'INR', 'PKR'];
export const COURSE_LANGUAGES: readonly CourseLanguage[] = ['en', 'es', 'fr', 'de', 'ur', 'hi', 'ar'];

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  teacher_id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'varchar', length: 250, unique: true })
  slug!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'varchar', length: 5, default: 'en' })
  language!: CourseLanguage;

  @Column({ type: 'numeric', precision: 10, scale: 2, default: 0, transformer: new ColumnNumericTransformer() })
  price!: number;

  @Column({ type: 'varchar', length: 3, default: 'USD' })
  currency!: CourseCurrency;

  @Column({ type: 'boolean', default: false })
  is_free!: boolean;

  @Column({ type: 'boolean', default: false })
  is_published!: boolean;

  @Column({ type: 'varchar', length: 500, nullable: true })
  thumbnail_url?: string | null;

  @Column({ type: 'varchar', length: 20, default: 'beginner' })
  level!: CourseLevel;

  @Column({ type: 'integer', default: 0 })
  duration_hours!: number;

  @Column({ type: 'integer', nullable: true })
  max_students?: number | null;

  @Column({ type: 'text', default: '' })
  prerequisites!: string;

  @Column({ type: 'text', default: '' })
  learning_objectives!: string;

  @Column({ type: 'varchar', length: 500, default: '' })
  tags!: string;

  @CreateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamp with time zone', default: () => 'now()' })
  updated_at!: Date;

  // Relations
  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'teacher_id' })
  teacher?: User;

  @OneToMany(() => CourseModule, (module) => module.course)
  modules?: CourseModule[];
}
