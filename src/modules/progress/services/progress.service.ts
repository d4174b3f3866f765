import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { LessonProgress } from '../entities';
import { RecordLessonProgressDto } from '../dto';
import { calculateCourseProgress } from '../progress.calculator';
import { CourseContentService } from '../../courses/services/course-content.service';
import { EnrollmentsService, EnrollmentView, toEnrollmentView } from '../../courses/services/enrollments.service';
import { CourseEnrollment } from '../../courses/entities';
import { MailService } from '../../mail/mail.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { NotEnrolledException } from '../../../common/exceptions';
import { isUniqueViolation } from '../../../common/utils/database-error.util';

export interface LessonProgressView {
  lesson_id: string;
  is_completed: boolean;
  completion_percentage: number;
  time_spent_minutes: number;
  started_at: Date;
  completed_at: Date | null;
}

export interface RecordProgressResult {
  lesson_progress: LessonProgressView;
  enrollment: EnrollmentView;
}

export interface CourseProgressView {
  enrollment: EnrollmentView;
  total_lessons: number;
  completed_lessons: number;
  lessons: LessonProgressView[];
}

@Injectable()
export class ProgressService {
  private readonly logger = new Logger(ProgressService.name);

  constructor(
    @InjectRepository(LessonProgress)
    private progressRepository: Repository<LessonProgress>,
    private contentService: CourseContentService,
    private enrollmentsService: EnrollmentsService,
    private mailService: MailService,
  ) {}

  /**
   * Upserts the caller's progress on a lesson, then recomputes the course
   * enrollment. Concurrent writers: last one wins, and a racing first
   * insert is folded into the row that won.
   */
  async recordLessonProgress(
    caller: AuthUser,
    lessonId: string,
    dto: RecordLessonProgressDto,
  ): Promise<RecordProgressResult> {
    const { course, lesson } = await this.contentService.requireLesson(lessonId);

    const enrollment = await this.enrollmentsService.findActiveEnrollment(caller.sub, course.id);
    if (!enrollment) {
      throw new NotEnrolledException();
    }

    const now = new Date();
    const progress = await this.saveLessonProgress(caller.sub, lesson.id, dto, now);

    const updated = await this.recomputeEnrollment(enrollment, course.title, caller.email, now);

    return { lesson_progress: toLessonProgressView(progress), enrollment: toEnrollmentView(updated) };
  }

  private async saveLessonProgress(
    studentId: string,
    lessonId: string,
    dto: RecordLessonProgressDto,
    now: Date,
  ): Promise<LessonProgress> {
    const where = { student_id: studentId, lesson_id: lessonId };
    const existing = await this.progressRepository.findOne({ where });
    const progress =
      existing ??
      this.progressRepository.create({
        ...where,
        is_completed: false,
        completion_percentage: 0,
        time_spent_minutes: 0,
        started_at: now,
        completed_at: null,
      });
    applyProgress(progress, dto, now);

    try {
      return await this.progressRepository.save(progress);
    } catch (error) {
      if (existing || !isUniqueViolation(error)) {
        throw error;
      }
    }

    // A concurrent first report inserted the row; apply this one on top of it.
    const inserted = await this.progressRepository.findOne({ where });
    if (!inserted) {
      throw new Error(`Lesson progress for ${studentId}/${lessonId} vanished after a unique violation`);
    }
    applyProgress(inserted, dto, now);
    return this.progressRepository.save(inserted);
  }

  async getCourseProgress(caller: AuthUser, courseId: string): Promise<CourseProgressView> {
    const enrollment = await this.enrollmentsService.findEnrollment(caller.sub, courseId);
    if (!enrollment) {
      throw new NotEnrolledException();
    }

    const lessonIds = await this.contentService.lessonIdsOfCourse(courseId);
    const rows = lessonIds.length
      ? await this.progressRepository.find({
          where: { student_id: caller.sub, lesson_id: In(lessonIds) },
          order: { started_at: 'ASC' },
        })
      : [];

    return {
      enrollment: toEnrollmentView(enrollment),
      total_lessons: lessonIds.length,
      completed_lessons: rows.filter((row) => row.is_completed).length,
      lessons: rows.map(toLessonProgressView),
    };
  }

  private async recomputeEnrollment(
    enrollment: CourseEnrollment,
    courseTitle: string,
    studentEmail: string,
    now: Date,
  ): Promise<CourseEnrollment> {
    const lessonIds = await this.contentService.lessonIdsOfCourse(enrollment.course_id);
    const completed = lessonIds.length
      ? await this.progressRepository.count({
          where: { student_id: enrollment.student_id, lesson_id: In(lessonIds), is_completed: true },
        })
      : 0;

    const percentage = calculateCourseProgress(completed, lessonIds.length);
    enrollment.last_accessed_at = now;
    if (percentage !== null) {
      enrollment.progress_percentage = percentage;
    }

    // Completion is terminal: a later drop below 100 keeps the status.
    const justCompleted = percentage === 100 && enrollment.status !== 'completed';
    if (justCompleted) {
      enrollment.status = 'completed';
      enrollment.completed_at = now;
    }

    const saved = await this.enrollmentsService.saveEnrollment(enrollment);

    if (justCompleted) {
      this.logger.log(`Student ${enrollment.student_id} completed course ${enrollment.course_id}`);
      await this.mailService.sendCourseCompletedEmail(studentEmail, courseTitle);
    }
    return saved;
  }
}

function applyProgress(progress: LessonProgress, dto: RecordLessonProgressDto, now: Date): void {
  if (dto.completion_percentage !== undefined) {
    progress.completion_percentage = dto.completion_percentage;
  }
  progress.time_spent_minutes += dto.time_spent_minutes ?? 0;
  if (dto.is_completed && !progress.is_completed) {
    progress.is_completed = true;
    progress.completed_at = now;
  }
}

function toLessonProgressView(progress: LessonProgress): LessonProgressView {
  return {
    lesson_id: progress.lesson_id,
    is_completed: progress.is_completed,
    completion_percentage: progress.completion_percentage,
    time_spent_minutes: progress.time_spent_minutes,
    started_at: progress.started_at,
    completed_at: progress.completed_at ?? null,
  };
}
