import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EnrollmentsService } from './enrollments.service';
import { Course, CourseEnrollment } from '../entities';
import { UsersService } from '../../users/services/users.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { InMemoryRepository } from '../../../testing/in-memory-repository';

const student: AuthUser = { sub: 'student-1', email: 'student@example.com', role: 'Student', is_staff: false };
const otherStudent: AuthUser = { sub: 'student-2', email: 'other@example.com', role: 'Student', is_staff: false };
const teacher: AuthUser = { sub: 'teacher-1', email: 'teacher@example.com', role: 'Teacher', is_staff: false };

describe('EnrollmentsService', () => {
  let service: EnrollmentsService;
  let enrollments: InMemoryRepository<CourseEnrollment>;
  let courses: InMemoryRepository<Course>;
  const usersService = { findSummaries: jest.fn() };

  beforeEach(async () => {
    enrollments = new InMemoryRepository(() => new CourseEnrollment(), {
      unique: [['student_id', 'course_id']],
      defaults: () => ({ enrolled_at: new Date(), updated_at: new Date() }),
    });
    courses = new InMemoryRepository(() => new Course(), { unique: [['slug']] });
    usersService.findSummaries.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        EnrollmentsService,
        { provide: getRepositoryToken(CourseEnrollment), useValue: enrollments },
        { provide: getRepositoryToken(Course), useValue: courses },
        { provide: UsersService, useValue: usersService },
      ],
    }).compile();

    service = moduleRef.get(EnrollmentsService);
  });

  function createCourse(overrides: Partial<Course> = {}): Promise<Course> {
    return courses.save(
      courses.create({
        teacher_id: teacher.sub,
        title: 'Intro to Python',
        slug: 'intro-to-python',
        is_published: true,
        max_students: null,
        ...overrides,
      }),
    );
  }

  it('enrolls a student in a published course', async () => {
    const course = await createCourse();

    const view = await service.enroll(student, course.id);

    expect(view).toMatchObject({
      course_id: course.id,
      student_id: 'student-1',
      status: 'enrolled',
      is_active: true,
      progress_percentage: 0,
      completed_at: null,
    });
    expect(enrollments.all).toHaveLength(1);
  });

  it('rejects a second enrollment in the same course', async () => {
    const course = await createCourse();
    await service.enroll(student, course.id);

    await expect(service.enroll(student, course.id)).rejects.toMatchObject({
      response: { errorCode: 'ALREADY_ENROLLED' },
    });
    expect(enrollments.all).toHaveLength(1);
  });

  it('rejects callers who are not students', async () => {
    const course = await createCourse();

    await expect(service.enroll(teacher, course.id)).rejects.toMatchObject({
      response: { errorCode: 'NOT_A_STUDENT' },
    });
  });

  it('hides unpublished courses', async () => {
    const course = await createCourse({ is_published: false });

    await expect(service.enroll(student, course.id)).rejects.toMatchObject({
      response: { errorCode: 'NOT_FOUND' },
    });
  });

  it('stops enrolling once the course is full', async () => {
    const course = await createCourse({ max_students: 1 });
    await service.enroll(student, course.id);

    await expect(service.enroll(otherStudent, course.id)).rejects.toMatchObject({
      response: { errorCode: 'COURSE_FULL' },
    });
  });

  it('keeps the row when a student unenrolls', async () => {
    const course = await createCourse();
    await service.enroll(student, course.id);

    const view = await service.unenroll(student, course.id);

    expect(view).toMatchObject({ status: 'dropped', is_active: false });
    expect(enrollments.all).toHaveLength(1);
    await expect(service.hasActiveEnrollment(student, course.id)).resolves.toBe(false);
  });

  it('requires an enrollment to unenroll', async () => {
    const course = await createCourse();

    await expect(service.unenroll(student, course.id)).rejects.toMatchObject({
      response: { errorCode: 'NOT_ENROLLED' },
    });
  });

  it('lists only active enrollments of the caller with their course', async () => {
    const python = await createCourse();
    const rust = await createCourse({ title: 'Rust Basics', slug: 'rust-basics' });
    await service.enroll(student, python.id);
    await service.enroll(student, rust.id);
    await service.unenroll(student, rust.id);

    const result = await service.listMyEnrollments(student);

    expect(result.data).toHaveLength(1);
    expect(result.data[0].course).toMatchObject({ id: python.id, slug: 'intro-to-python' });
    expect(result.pagination).toEqual({ page: 1, limit: 12, total: 1, pages: 1 });
  });

  it('lets only the teacher list a course roster', async () => {
    const course = await createCourse();
    await service.enroll(student, course.id);
    usersService.findSummaries.mockResolvedValue(
      new Map([['student-1', { id: 'student-1', email: 'student@example.com', full_name: 'Ada Lovelace' }]]),
    );

    const roster = await service.listCourseEnrollments(teacher, course.id);

    expect(roster.data[0].student).toEqual({ id: 'student-1', email: 'student@example.com', full_name: 'Ada Lovelace' });
    await expect(service.listCourseEnrollments(student, course.id)).rejects.toMatchObject({
      response: { errorCode: 'PERMISSION_DENIED' },
    });
  });

  it('counts active enrollments per course', async () => {
    const course = await createCourse();
    await service.enroll(student, course.id);
    await service.enroll(otherStudent, course.id);
    await service.unenroll(otherStudent, course.id);

    const counts = await service.countActiveByCourse([course.id, 'missing']);

    expect(counts.get(course.id)).toBe(1);
    expect(counts.get('missing')).toBe(0);
  });
});
