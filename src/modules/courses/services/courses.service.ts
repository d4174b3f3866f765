import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, In, ObjectLiteral, Repository } from 'typeorm';
import { Course, CourseCurrency, CourseLanguage, CourseLevel, EnrollmentStatus } from '../entities';
import { Category, CourseCategory } from '../../categories/entities';
import { CreateCourseDto, ListCoursesQueryDto, UpdateCourseDto } from '../dto';
import { CourseContentService, ModuleView } from './course-content.service';
import { EnrollmentsService } from './enrollments.service';
import { ReviewsService } from './reviews.service';
import { UsersService, UserSummary } from '../../users/services/users.service';
import { assertCourseAccess, evaluateCourseAccess } from '../policies/course-access.policy';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { ResourceNotFoundException } from '../../../common/exceptions';
import { uniqueSlug } from '../../../common/utils/slug.util';
import { isUniqueViolation } from '../../../common/utils/database-error.util';
import { PaginationResult, PaginationUtil } from '../../../common/utils/pagination.util';

const SLUG_ATTEMPTS = 3;

export interface CourseListItem {
  id: string;
  title: string;
  slug: string;
  description: string;
  teacher: UserSummary | null;
  language: CourseLanguage;
  price: number;
  currency: CourseCurrency;
  is_free: boolean;
  is_published: boolean;
  thumbnail_url: string | null;
  level: CourseLevel;
  duration_hours: number;
  tags: string;
  created_at: Date;
  average_rating: number;
  enrolled_count: number;
  is_enrolled: boolean;
}

export interface CourseDetail extends CourseListItem {
  max_students: number | null;
  prerequisites: string;
  learning_objectives: string;
  updated_at: Date;
  categories: { id: string; title: string }[];
  modules: ModuleView[];
  reviews_count: number;
  enrollment_status: EnrollmentStatus | null;
}

const ENROLLED_COUNT_SQL =
  '(SELECT COUNT(*) FROM course_enrollments e WHERE e.course_id = course.id AND e.is_active = true)';
const AVERAGE_RATING_SQL =
  '(SELECT COALESCE(AVG(r.rating), 0) FROM course_reviews r WHERE r.course_id = course.id AND r.is_published = true)';

/** The query-builder calls the catalog filters need. */
export interface CourseListQueryTarget {
  where(condition: string, parameters?: ObjectLiteral): unknown;
  andWhere(condition: string, parameters?: ObjectLiteral): unknown;
  addSelect(selection: string, alias?: string): unknown;
  orderBy(sort: string, order?: 'ASC' | 'DESC'): unknown;
  addOrderBy(sort: string, order?: 'ASC' | 'DESC'): unknown;
}

/**
 * Applies the catalog filters and ordering to a published-course query
 * aliased `course`.
 */
export function applyCourseListQuery<Q extends CourseListQueryTarget>(queryBuilder: Q, query: ListCoursesQueryDto): Q {
  queryBuilder.where('course.is_published = :published', { published: true });

  const search = query.search?.trim();
  if (search) {
    queryBuilder.andWhere(
      '(course.title ILIKE :search OR course.description ILIKE :search OR course.tags ILIKE :search)',
      { search: `%${search}%` },
    );
  }

  if (query.category) {
    queryBuilder.andWhere(
      'EXISTS (SELECT 1 FROM course_categories cc INNER JOIN categories cat ON cat.id = cc.category_id ' +
        'WHERE cc.course_id = course.id AND LOWER(cat.title) = LOWER(:category))',
      { category: query.category },
    );
  }

  if (query.level) {
    queryBuilder.andWhere('course.level = :level', { level: query.level });
  }

  if (query.language) {
    queryBuilder.andWhere('course.language = :language', { language: query.language });
  }

  if (query.price === 'free') {
    queryBuilder.andWhere('(course.is_free = true OR course.price = 0)');
  } else if (query.price === 'paid') {
    queryBuilder.andWhere('course.is_free = false AND course.price > 0');
  }

  if (query.teacher) {
    queryBuilder.andWhere('course.teacher_id = :teacher', { teacher: query.teacher });
  }

  switch (query.sort ?? 'newest') {
    case 'popular':
      queryBuilder.addSelect(ENROLLED_COUNT_SQL, 'enrolled_count');
      queryBuilder.orderBy('enrolled_count', 'DESC');
      break;
    case 'rating':
      queryBuilder.addSelect(AVERAGE_RATING_SQL, 'average_rating');
      queryBuilder.orderBy('average_rating', 'DESC');
      break;
    case 'price_low':
      queryBuilder.orderBy('course.price', 'ASC');
      break;
    case 'price_high':
      queryBuilder.orderBy('course.price', 'DESC');
      break;
    case 'newest':
      queryBuilder.orderBy('course.created_at', 'DESC');
      return queryBuilder;
  }

  queryBuilder.addOrderBy('course.created_at', 'DESC');
  return queryBuilder;
}

@Injectable()
export class CoursesService {
  private readonly logger = new Logger(CoursesService.name);

  constructor(
    @InjectRepository(Course)
    private courseRepository: Repository<Course>,
    @InjectRepository(Category)
    private categoryRepository: Repository<Category>,
    @InjectRepository(CourseCategory)
    private courseCategoryRepository: Repository<CourseCategory>,
    private contentService: CourseContentService,
    private enrollmentsService: EnrollmentsService,
    private reviewsService: ReviewsService,
    private usersService: UsersService,
  ) {}

  async createCourse(caller: AuthUser, dto: CreateCourseDto): Promise<CourseDetail> {
    const { category_ids: categoryIds, ...fields } = dto;
    if (categoryIds) {
      await this.requireCategories(categoryIds);
    }

    const course = await this.insertWithUniqueSlug(dto.title, {
      ...fields,
      teacher_id: caller.sub,
      description: fields.description ?? '',
      price: fields.price ?? 0,
      is_free: fields.is_free ?? false,
      is_published: fields.is_published ?? false,
      created_at: new Date(),
    });

    if (categoryIds) {
      await this.replaceCategories(course.id, categoryIds);
    }

    this.logger.log(`Course ${course.id} (${course.slug}) created by ${caller.sub}`);
    return this.toDetail(course, caller);
  }

  async listCourses(query: ListCoursesQueryDto, caller: AuthUser | null): Promise<PaginationResult<CourseListItem>> {
    const options = PaginationUtil.validatePaginationOptions(query.page, query.page_size);

    const [courses, total] = await applyCourseListQuery(this.courseRepository.createQueryBuilder('course'), query)
      .skip(PaginationUtil.getSkip(options.page, options.limit))
      .take(options.limit)
      .getManyAndCount();

    const items = await this.toListItems(courses, caller);
    return PaginationUtil.createPaginationResult(items, total, options.page, options.limit);
  }

  /**
   * Unpublished or otherwise unreadable courses are reported as missing.
   */
  // Two creates with one title can pick the same free slug; the loser picks again.
  private async insertWithUniqueSlug(title: string, fields: DeepPartial<Course>): Promise<Course> {
    for (let attempt = 1; ; attempt += 1) {
      const slug = await uniqueSlug(title, async (candidate) => (await this.courseRepository.count({ where: { slug: candidate } })) > 0);
      try {
        return await this.courseRepository.save(this.courseRepository.create({ ...fields, slug }));
      } catch (error) {
        if (attempt >= SLUG_ATTEMPTS || !isUniqueViolation(error, 'uq_courses_slug')) {
          throw error;
        }
        this.logger.warn(`Slug ${slug} was taken concurrently, retrying`);
      }
    }
  }

  async getCourseBySlug(slug: string, caller: AuthUser | null): Promise<CourseDetail> {
    const course = await this.courseRepository.findOne({ where: { slug } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }

    const decision = evaluateCourseAccess({
      actor: caller,
      action: 'read',
      resource: { teacherId: course.teacher_id, coursePublished: course.is_published },
      hasActiveEnrollment: await this.enrollmentsService.hasActiveEnrollment(caller, course.id),
    });
    if (!decision.allowed) {
      throw new ResourceNotFoundException('Course');
    }

    return this.toDetail(course, caller, await this.contentService.buildOutline(course, decision));
  }

  async updateCourse(slug: string, caller: AuthUser | null, dto: UpdateCourseDto): Promise<CourseDetail> {
    const course = await this.requireCourseForWrite(slug, caller, 'update');
    const { category_ids: categoryIds, ...fields } = dto;
    if (categoryIds) {
      await this.requireCategories(categoryIds);
    }

    Object.assign(course, fields);
    await this.courseRepository.save(course);

    if (categoryIds) {
      await this.replaceCategories(course.id, categoryIds);
    }

    this.logger.log(`Course ${course.id} updated`);
    return this.toDetail(course, caller);
  }

  async deleteCourse(slug: string, caller: AuthUser | null): Promise<void> {
    const course = await this.requireCourseForWrite(slug, caller, 'delete');
    await this.courseRepository.remove(course);
    this.logger.log(`Course ${course.id} (${slug}) deleted`);
  }

  async listMyTeachingCourses(
    caller: AuthUser,
    page?: number,
    pageSize?: number,
  ): Promise<PaginationResult<CourseListItem>> {
    const options = PaginationUtil.validatePaginationOptions(page, pageSize);
    const [courses, total] = await this.courseRepository.findAndCount({
      where: { teacher_id: caller.sub },
      order: { created_at: 'DESC' },
      skip: PaginationUtil.getSkip(options.page, options.limit),
      take: options.limit,
    });

    const items = await this.toListItems(courses, caller);
    return PaginationUtil.createPaginationResult(items, total, options.page, options.limit);
  }

  private async requireCourseForWrite(
    slug: string,
    caller: AuthUser | null,
    action: 'update' | 'delete',
  ): Promise<Course> {
    const course = await this.courseRepository.findOne({ where: { slug } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }

    assertCourseAccess({
      actor: caller,
      action,
      resource: { teacherId: course.teacher_id, coursePublished: course.is_published },
      hasActiveEnrollment: await this.enrollmentsService.hasActiveEnrollment(caller, course.id),
    });
    return course;
  }

  private async requireCategories(categoryIds: string[]): Promise<void> {
    if (categoryIds.length === 0) {
      return;
    }
    const found = await this.categoryRepository.count({ where: { id: In(categoryIds) } });
    if (found !== categoryIds.length) {
      throw new ResourceNotFoundException('Category');
    }
  }

  private async replaceCategories(courseId: string, categoryIds: string[]): Promise<void> {
    await this.courseCategoryRepository.delete({ course_id: courseId });
    for (const categoryId of categoryIds) {
      await this.courseCategoryRepository.save(
        this.courseCategoryRepository.create({ course_id: courseId, category_id: categoryId }),
      );
    }
  }

  private async toListItems(courses: Course[], caller: AuthUser | null): Promise<CourseListItem[]> {
    const courseIds = courses.map((course) => course.id);
    const [teachers, ratings, counts, enrolled] = await Promise.all([
      this.usersService.findSummaries([...new Set(courses.map((course) => course.teacher_id))]),
      this.reviewsService.summarize(courseIds),
      this.enrollmentsService.countActiveByCourse(courseIds),
      this.enrollmentsService.activeCourseIdsFor(caller, courseIds),
    ]);

    return courses.map((course) => ({
      id: course.id,
      title: course.title,
      slug: course.slug,
      description: course.description,
      teacher: teachers.get(course.teacher_id) ?? null,
      language: course.language,
      price: course.price,
      currency: course.currency,
      is_free: course.is_free,
      is_published: course.is_published,
      thumbnail_url: course.thumbnail_url ?? null,
      level: course.level,
      duration_hours: course.duration_hours,
      tags: course.tags,
      created_at: course.created_at,
      average_rating: ratings.get(course.id)?.average_rating ?? 0,
      enrolled_count: counts.get(course.id) ?? 0,
      is_enrolled: enrolled.has(course.id),
    }));
  }

  private async toDetail(course: Course, caller: AuthUser | null, modules?: ModuleView[]): Promise<CourseDetail> {
    const [item] = await this.toListItems([course], caller);
    const ratings = await this.reviewsService.summarize([course.id]);
    const enrollment = caller ? await this.enrollmentsService.findEnrollment(caller.sub, course.id) : null;

    const links = await this.courseCategoryRepository.find({ where: { course_id: course.id } });
    const categories = links.length
      ? await this.categoryRepository.find({
          where: { id: In(links.map((link) => link.category_id)) },
          order: { title: 'ASC' },
        })
      : [];

    let outline = modules;
    if (!outline) {
      const decision = evaluateCourseAccess({
        actor: caller,
        action: 'read',
        resource: { teacherId: course.teacher_id, coursePublished: course.is_published },
        hasActiveEnrollment: enrollment?.is_active ?? false,
      });
      outline = decision.allowed ? await this.contentService.buildOutline(course, decision) : [];
    }

    return {
      ...item,
      max_students: course.max_students ?? null,
      prerequisites: course.prerequisites,
      learning_objectives: course.learning_objectives,
      updated_at: course.updated_at,
      categories: categories.map((category) => ({ id: category.id, title: category.title })),
      modules: outline,
      reviews_count: ratings.get(course.id)?.reviews_count ?? 0,
      enrollment_status: enrollment?.status ?? null,
    };
  }
}
