import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ProgressService } from './progress.service';
import { LessonProgress } from '../entities';
import { CourseContentService } from '../../courses/services/course-content.service';
import { EnrollmentsService } from '../../courses/services/enrollments.service';
import { Course, CourseEnrollment, CourseModule, Lesson } from '../../courses/entities';
import { MailService } from '../../mail/mail.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { InMemoryRepository } from '../../../testing/in-memory-repository';

const student: AuthUser = { sub: 'student-1', email: 'student@example.com', role: 'Student', is_staff: false };

describe('ProgressService', () => {
  let service: ProgressService;
  let progress: InMemoryRepository<LessonProgress>;
  let enrollment: CourseEnrollment | null;

  const course = Object.assign(new Course(), { id: 'course-1', title: 'Intro to Python', teacher_id: 'teacher-1' });
  const module = Object.assign(new CourseModule(), { id: 'module-1', course_id: 'course-1' });
  const lessonIds = ['lesson-1', 'lesson-2', 'lesson-3'];

  const contentService = { requireLesson: jest.fn(), lessonIdsOfCourse: jest.fn() };
  const enrollmentsService = { findActiveEnrollment: jest.fn(), findEnrollment: jest.fn(), saveEnrollment: jest.fn() };
  const mailService = { sendCourseCompletedEmail: jest.fn() };

  beforeEach(async () => {
    progress = new InMemoryRepository(() => new LessonProgress(), {
      unique: [['student_id', 'lesson_id']],
      defaults: () => ({ updated_at: new Date() }),
    });
    enrollment = Object.assign(new CourseEnrollment(), {
      id: 'enrollment-1',
      student_id: 'student-1',
      course_id: 'course-1',
      status: 'enrolled',
      is_active: true,
      progress_percentage: 0,
      enrolled_at: new Date('2026-01-01T00:00:00Z'),
      completed_at: null,
      last_accessed_at: null,
    });

    contentService.requireLesson
      .mockReset()
      .mockImplementation(async (id: string) => ({ course, module, lesson: Object.assign(new Lesson(), { id }) }));
    contentService.lessonIdsOfCourse.mockReset().mockResolvedValue(lessonIds);
    enrollmentsService.findActiveEnrollment.mockReset().mockImplementation(async () => enrollment);
    enrollmentsService.findEnrollment.mockReset().mockImplementation(async () => enrollment);
    enrollmentsService.saveEnrollment.mockReset().mockImplementation(async (row: CourseEnrollment) => row);
    mailService.sendCourseCompletedEmail.mockReset().mockResolvedValue(true);

    const moduleRef = await Test.createTestingModule({
      providers: [
        ProgressService,
        { provide: getRepositoryToken(LessonProgress), useValue: progress },
        { provide: CourseContentService, useValue: contentService },
        { provide: EnrollmentsService, useValue: enrollmentsService },
        { provide: MailService, useValue: mailService },
      ],
    }).compile();

    service = moduleRef.get(ProgressService);
  });

  it('requires an active enrollment', async () => {
    enrollment = null;

    await expect(service.recordLessonProgress(student, 'lesson-1', { is_completed: true })).rejects.toMatchObject({
      response: { errorCode: 'NOT_ENROLLED' },
    });
    expect(progress.all).toHaveLength(0);
  });

  it('derives the course percentage from completed lessons', async () => {
    const first = await service.recordLessonProgress(student, 'lesson-1', { is_completed: true });
    expect(first.enrollment.progress_percentage).toBe(33);

    const second = await service.recordLessonProgress(student, 'lesson-2', { is_completed: true });
    expect(second.enrollment).toMatchObject({ progress_percentage: 67, status: 'enrolled', completed_at: null });
  });

  it('does not count partially watched lessons', async () => {
    const result = await service.recordLessonProgress(student, 'lesson-1', {
      completion_percentage: 90,
      time_spent_minutes: 12,
    });

    expect(result.lesson_progress).toMatchObject({ is_completed: false, completion_percentage: 90, time_spent_minutes: 12 });
    expect(result.enrollment.progress_percentage).toBe(0);
  });

  it('replaces the lesson percentage with the latest report, even a lower one', async () => {
    await service.recordLessonProgress(student, 'lesson-1', { completion_percentage: 90 });
    const result = await service.recordLessonProgress(student, 'lesson-1', { completion_percentage: 40 });

    expect(result.lesson_progress.completion_percentage).toBe(40);
    expect(progress.all).toEqual([expect.objectContaining({ lesson_id: 'lesson-1', completion_percentage: 40 })]);
  });

  it('keeps the first completion time when a lesson is completed again', async () => {
    const firstCompletion = new Date('2026-01-02T00:00:00Z');
    await service.recordLessonProgress(student, 'lesson-1', { is_completed: true });
    await progress.update({ lesson_id: 'lesson-1' }, { completed_at: firstCompletion });

    const result = await service.recordLessonProgress(student, 'lesson-1', { is_completed: true });

    expect(result.lesson_progress.completed_at).toEqual(firstCompletion);
    expect(progress.all[0].completed_at).toEqual(firstCompletion);
  });

  it('folds a racing first report into the row that was inserted first', async () => {
    await service.recordLessonProgress(student, 'lesson-1', { completion_percentage: 30, time_spent_minutes: 5 });
    // The second request looked before the first one's insert landed.
    jest.spyOn(progress, 'findOne').mockResolvedValueOnce(null);

    const result = await service.recordLessonProgress(student, 'lesson-1', { time_spent_minutes: 7, is_completed: true });

    expect(result.lesson_progress).toMatchObject({ completion_percentage: 30, time_spent_minutes: 12, is_completed: true });
    expect(progress.all).toHaveLength(1);
    expect(result.enrollment.progress_percentage).toBe(33);
  });

  it('accumulates time spent on a lesson', async () => {
    await service.recordLessonProgress(student, 'lesson-1', { time_spent_minutes: 5 });
    const result = await service.recordLessonProgress(student, 'lesson-1', { time_spent_minutes: 7 });

    expect(result.lesson_progress.time_spent_minutes).toBe(12);
    expect(progress.all).toHaveLength(1);
  });

  it('completes the enrollment once and sends one mail', async () => {
    for (const lessonId of lessonIds) {
      await service.recordLessonProgress(student, lessonId, { is_completed: true });
    }
    const completedAt = enrollment?.completed_at;

    const again = await service.recordLessonProgress(student, 'lesson-3', { is_completed: true });

    expect(again.enrollment).toMatchObject({ status: 'completed', progress_percentage: 100 });
    expect(again.enrollment.completed_at).toBe(completedAt);
    expect(mailService.sendCourseCompletedEmail).toHaveBeenCalledTimes(1);
    expect(mailService.sendCourseCompletedEmail).toHaveBeenCalledWith('student@example.com', 'Intro to Python');
  });

  it('keeps the completed status when a new lesson is added later', async () => {
    for (const lessonId of lessonIds) {
      await service.recordLessonProgress(student, lessonId, { is_completed: true });
    }
    contentService.lessonIdsOfCourse.mockResolvedValue([...lessonIds, 'lesson-4']);

    const result = await service.recordLessonProgress(student, 'lesson-1', { time_spent_minutes: 1 });

    expect(result.enrollment).toMatchObject({ status: 'completed', progress_percentage: 75 });
  });

  it('reports per-lesson progress for the course', async () => {
    await service.recordLessonProgress(student, 'lesson-1', { is_completed: true });
    await service.recordLessonProgress(student, 'lesson-2', { completion_percentage: 40 });

    const view = await service.getCourseProgress(student, 'course-1');

    expect(view.total_lessons).toBe(3);
    expect(view.completed_lessons).toBe(1);
    expect(view.lessons.map((row) => row.lesson_id).sort()).toEqual(['lesson-1', 'lesson-2']);
  });
});
