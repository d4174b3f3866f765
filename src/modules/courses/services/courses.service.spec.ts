import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CoursesService, applyCourseListQuery } from './courses.service';
import { CourseContentService } from './course-content.service';
import { EnrollmentsService } from './enrollments.service';
import { ReviewsService } from './reviews.service';
import { Course } from '../entities';
import { Category, CourseCategory } from '../../categories/entities';
import { UsersService } from '../../users/services/users.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { InMemoryRepository } from '../../../testing/in-memory-repository';

const teacher: AuthUser = { sub: 'teacher-1', email: 'teacher@example.com', role: 'Teacher', is_staff: false };
const otherTeacher: AuthUser = { sub: 'teacher-2', email: 'other@example.com', role: 'Teacher', is_staff: false };

function recordingQueryBuilder() {
  return {
    where: jest.fn(),
    andWhere: jest.fn(),
    addSelect: jest.fn(),
    orderBy: jest.fn(),
    addOrderBy: jest.fn(),
  };
}

describe('applyCourseListQuery', () => {
  it('orders published courses newest first by default', () => {
    const qb = recordingQueryBuilder();

    applyCourseListQuery(qb, {});

    expect(qb.where).toHaveBeenCalledWith('course.is_published = :published', { published: true });
    expect(qb.andWhere).not.toHaveBeenCalled();
    expect(qb.orderBy).toHaveBeenCalledWith('course.created_at', 'DESC');
    expect(qb.addOrderBy).not.toHaveBeenCalled();
  });

  it('matches the search term anywhere in title, description or tags', () => {
    const qb = recordingQueryBuilder();

    applyCourseListQuery(qb, { search: '  python ' });

    expect(qb.andWhere).toHaveBeenCalledWith(
      '(course.title ILIKE :search OR course.description ILIKE :search OR course.tags ILIKE :search)',
      { search: '%python%' },
    );
  });

  it('filters free courses and by level', () => {
    const qb = recordingQueryBuilder();

    applyCourseListQuery(qb, { price: 'free', level: 'advanced' });

    expect(qb.andWhere).toHaveBeenCalledWith('course.level = :level', { level: 'advanced' });
    expect(qb.andWhere).toHaveBeenCalledWith('(course.is_free = true OR course.price = 0)');
  });

  it('sorts by enrollment count and breaks ties by recency', () => {
    const qb = recordingQueryBuilder();

    applyCourseListQuery(qb, { sort: 'popular' });

    expect(qb.addSelect).toHaveBeenCalledWith(expect.stringContaining('FROM course_enrollments'), 'enrolled_count');
    expect(qb.orderBy).toHaveBeenCalledWith('enrolled_count', 'DESC');
    expect(qb.addOrderBy).toHaveBeenCalledWith('course.created_at', 'DESC');
  });

  it('sorts by price ascending', () => {
    const qb = recordingQueryBuilder();

    applyCourseListQuery(qb, { sort: 'price_low' });

    expect(qb.orderBy).toHaveBeenCalledWith('course.price', 'ASC');
  });
});

describe('CoursesService', () => {
  let service: CoursesService;
  let courses: InMemoryRepository<Course>;
  let categories: InMemoryRepository<Category>;
  let links: InMemoryRepository<CourseCategory>;
  const contentService = { buildOutline: jest.fn() };
  const enrollmentsService = {
    hasActiveEnrollment: jest.fn(),
    findEnrollment: jest.fn(),
    countActiveByCourse: jest.fn(),
    activeCourseIdsFor: jest.fn(),
  };
  const reviewsService = { summarize: jest.fn() };
  const usersService = { findSummaries: jest.fn() };

  beforeEach(async () => {
    courses = new InMemoryRepository(() => new Course(), {
      unique: [{ name: 'uq_courses_slug', columns: ['slug'] }],
      defaults: () => ({
        language: 'en',
        currency: 'USD',
        level: 'beginner',
        duration_hours: 0,
        max_students: null,
        prerequisites: '',
        learning_objectives: '',
        tags: '',
        updated_at: new Date(),
      }),
    });
    categories = new InMemoryRepository(() => new Category(), { unique: [['title']] });
    links = new InMemoryRepository(() => new CourseCategory(), { unique: [['course_id', 'category_id']] });

    contentService.buildOutline.mockReset().mockResolvedValue([]);
    enrollmentsService.hasActiveEnrollment.mockReset().mockResolvedValue(false);
    enrollmentsService.findEnrollment.mockReset().mockResolvedValue(null);
    enrollmentsService.countActiveByCourse.mockReset().mockResolvedValue(new Map());
    enrollmentsService.activeCourseIdsFor.mockReset().mockResolvedValue(new Set());
    reviewsService.summarize.mockReset().mockResolvedValue(new Map());
    usersService.findSummaries.mockReset().mockResolvedValue(new Map());

    const moduleRef = await Test.createTestingModule({
      providers: [
        CoursesService,
        { provide: getRepositoryToken(Course), useValue: courses },
        { provide: getRepositoryToken(Category), useValue: categories },
        { provide: getRepositoryToken(CourseCategory), useValue: links },
        { provide: CourseContentService, useValue: contentService },
        { provide: EnrollmentsService, useValue: enrollmentsService },
        { provide: ReviewsService, useValue: reviewsService },
        { provide: UsersService, useValue: usersService },
      ],
    }).compile();

    service = moduleRef.get(CoursesService);
  });

  it('derives a unique slug from the title', async () => {
    const first = await service.createCourse(teacher, { title: 'Intro to Python' });
    const second = await service.createCourse(teacher, { title: 'Intro to Python' });

    expect(first.slug).toBe('intro-to-python');
    expect(second.slug).toBe('intro-to-python-1');
  });

  it('picks the next slug when a concurrent create took the first one', async () => {
    await service.createCourse(teacher, { title: 'Intro to Python' });
    // The lookup ran before the other create committed.
    jest.spyOn(courses, 'count').mockResolvedValueOnce(0);

    const detail = await service.createCourse(teacher, { title: 'Intro to Python' });

    expect(detail.slug).toBe('intro-to-python-1');
    expect(courses.all.map((course) => course.slug).sort()).toEqual(['intro-to-python', 'intro-to-python-1']);
  });

  it('creates courses as unpublished drafts owned by the caller', async () => {
    const detail = await service.createCourse(teacher, { title: 'Rust Basics', price: 20 });

    expect(detail).toMatchObject({
      is_published: false,
      price: 20,
      is_free: false,
      average_rating: 0,
      enrolled_count: 0,
      is_enrolled: false,
      categories: [],
      modules: [],
      enrollment_status: null,
    });
    expect(courses.all[0].teacher_id).toBe('teacher-1');
  });

  it('links the given categories', async () => {
    const design = await categories.save(categories.create({ title: 'Design', is_active: true }));

    const detail = await service.createCourse(teacher, { title: 'Typography', category_ids: [design.id] });

    expect(detail.categories).toEqual([{ id: design.id, title: 'Design' }]);
  });

  it('rejects unknown categories before creating anything', async () => {
    await expect(
      service.createCourse(teacher, { title: 'Typography', category_ids: ['00000000-0000-4000-8000-000000000000'] }),
    ).rejects.toMatchObject({ response: { errorCode: 'NOT_FOUND' } });
    expect(courses.all).toHaveLength(0);
  });

  it('reports an unpublished course as missing to anonymous callers', async () => {
    await service.createCourse(teacher, { title: 'Hidden Draft' });

    await expect(service.getCourseBySlug('hidden-draft', null)).rejects.toMatchObject({
      response: { errorCode: 'NOT_FOUND' },
    });
  });

  it('shows a draft to its teacher', async () => {
    await service.createCourse(teacher, { title: 'Hidden Draft' });

    await expect(service.getCourseBySlug('hidden-draft', teacher)).resolves.toMatchObject({ slug: 'hidden-draft' });
  });

  it('lets only the teacher update a course', async () => {
    await service.createCourse(teacher, { title: 'Intro to Python', is_published: true });

    await expect(service.updateCourse('intro-to-python', otherTeacher, { title: 'Taken over' })).rejects.toMatchObject({
      response: { errorCode: 'PERMISSION_DENIED' },
    });
    await expect(service.updateCourse('intro-to-python', null, { title: 'Taken over' })).rejects.toMatchObject({
      response: { errorCode: 'AUTHENTICATION_REQUIRED' },
    });

    const updated = await service.updateCourse('intro-to-python', teacher, { title: 'Python for Beginners' });
    expect(updated).toMatchObject({ title: 'Python for Beginners', slug: 'intro-to-python' });
  });

  it('deletes a course for its teacher', async () => {
    await service.createCourse(teacher, { title: 'Intro to Python' });

    await service.deleteCourse('intro-to-python', teacher);

    expect(courses.all).toHaveLength(0);
  });

  it('lists the courses the caller teaches', async () => {
    await service.createCourse(teacher, { title: 'Intro to Python' });
    await service.createCourse(otherTeacher, { title: 'Rust Basics' });

    const result = await service.listMyTeachingCourses(teacher);

    expect(result.data.map((course) => course.slug)).toEqual(['intro-to-python']);
    expect(result.pagination.total).toBe(1);
  });
});
