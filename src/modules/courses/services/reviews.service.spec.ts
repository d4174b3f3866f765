import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ReviewsService, averageRating } from './reviews.service';
import { EnrollmentsService } from './enrollments.service';
import { Course, CourseReview } from '../entities';
import { UsersService } from '../../users/services/users.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { InMemoryRepository } from '../../../testing/in-memory-repository';

const student: AuthUser = { sub: 'student-1', email: 'student@example.com', role: 'Student', is_staff: false };
const otherStudent: AuthUser = { sub: 'student-2', email: 'other@example.com', role: 'Student', is_staff: false };

describe('averageRating', () => {
  it('rounds the mean to one decimal', () => {
    expect(averageRating([3, 4, 5])).toBe(4);
    expect(averageRating([4, 5])).toBe(4.5);
    expect(averageRating([5, 4, 4])).toBe(4.3);
  });

  it('is 0 without ratings', () => {
    expect(averageRating([])).toBe(0);
  });
});

describe('ReviewsService', () => {
  let service: ReviewsService;
  let reviews: InMemoryRepository<CourseReview>;
  let courses: InMemoryRepository<Course>;
  let course: Course;
  const enrollmentsService = { hasActiveEnrollment: jest.fn() };
  const usersService = { findSummaries: jest.fn() };

  beforeEach(async () => {
    reviews = new InMemoryRepository(() => new CourseReview(), {
      unique: [['course_id', 'student_id']],
      defaults: () => ({ created_at: new Date(), updated_at: new Date() }),
    });
    courses = new InMemoryRepository(() => new Course());
    enrollmentsService.hasActiveEnrollment.mockReset().mockResolvedValue(true);
    usersService.findSummaries.mockReset().mockResolvedValue(new Map());

    const moduleRef = await Test.createTestingModule({
      providers: [
        ReviewsService,
        { provide: getRepositoryToken(CourseReview), useValue: reviews },
        { provide: getRepositoryToken(Course), useValue: courses },
        { provide: EnrollmentsService, useValue: enrollmentsService },
        { provide: UsersService, useValue: usersService },
      ],
    }).compile();

    service = moduleRef.get(ReviewsService);
    course = await courses.save(
      courses.create({ teacher_id: 'teacher-1', title: 'Intro to Python', slug: 'intro-to-python', is_published: true }),
    );
  });

  it('adds a review for an enrolled student', async () => {
    const view = await service.addReview(student, course.id, { rating: 5, review_text: 'Great pacing' });

    expect(view).toMatchObject({ course_id: course.id, student_id: 'student-1', rating: 5, review_text: 'Great pacing' });
  });

  it('requires an active enrollment', async () => {
    enrollmentsService.hasActiveEnrollment.mockResolvedValue(false);

    await expect(service.addReview(student, course.id, { rating: 4 })).rejects.toMatchObject({
      response: { errorCode: 'NOT_ENROLLED' },
    });
    expect(reviews.all).toHaveLength(0);
  });

  it('allows one review per student and course', async () => {
    await service.addReview(student, course.id, { rating: 4 });

    await expect(service.addReview(student, course.id, { rating: 2 })).rejects.toMatchObject({
      response: { errorCode: 'DUPLICATE_REVIEW' },
    });
  });

  it('fails for an unknown course', async () => {
    await expect(service.addReview(student, 'missing', { rating: 4 })).rejects.toMatchObject({
      response: { errorCode: 'NOT_FOUND' },
    });
  });

  it('lets only the author edit or delete a review', async () => {
    const review = await service.addReview(student, course.id, { rating: 3 });

    await expect(service.updateReview(otherStudent, review.id, { rating: 1 })).rejects.toMatchObject({
      response: { errorCode: 'PERMISSION_DENIED' },
    });
    await expect(service.updateReview(student, review.id, { rating: 4 })).resolves.toMatchObject({ rating: 4 });

    await service.deleteReview(student, review.id);
    expect(reviews.all).toHaveLength(0);
  });

  it('summarizes ratings per course', async () => {
    await service.addReview(student, course.id, { rating: 3 });
    await service.addReview(otherStudent, course.id, { rating: 4 });

    const summaries = await service.summarize([course.id, 'empty']);

    expect(summaries.get(course.id)).toEqual({ average_rating: 3.5, reviews_count: 2 });
    expect(summaries.get('empty')).toEqual({ average_rating: 0, reviews_count: 0 });
  });

  it('lists reviews with the student name', async () => {
    await service.addReview(student, course.id, { rating: 5 });
    usersService.findSummaries.mockResolvedValue(
      new Map([['student-1', { id: 'student-1', email: 'student@example.com', full_name: 'Ada Lovelace' }]]),
    );

    const result = await service.listReviews(course.id);

    expect(result.data).toHaveLength(1);
    expect(result.data[0].student_name).toBe('Ada Lovelace');
    expect(result.pagination.total).toBe(1);
  });
});
