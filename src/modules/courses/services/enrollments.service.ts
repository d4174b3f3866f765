import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Course, CourseEnrollment, EnrollmentStatus } from '../entities';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { UsersService, UserSummary } from '../../users/services/users.service';
import {
  AlreadyEnrolledException,
  CourseFullException,
  NotAStudentException,
  NotEnrolledException,
  PermissionDeniedException,
  ResourceNotFoundException,
} from '../../../common/exceptions';
import { isUniqueViolation } from '../../../common/utils/database-error.util';
import { PaginationResult, PaginationUtil } from '../../../common/utils/pagination.util';

export interface EnrollmentView {
  id: string;
  course_id: string;
  student_id: string;
  status: EnrollmentStatus;
  is_active: boolean;
  progress_percentage: number;
  enrolled_at: Date;
  completed_at: Date | null;
  last_accessed_at: Date | null;
}

export interface MyEnrollmentView extends EnrollmentView {
  course: { id: string; title: string; slug: string; thumbnail_url: string | null; level: Course['level'] } | null;
}

export interface CourseEnrollmentView extends EnrollmentView {
  student: UserSummary | null;
}

/**
 * Enrollment lifecycle: enrolled -> completed (progress reaches 100),
 * enrolled -> dropped (unenroll). Rows are never deleted.
 */
@Injectable()
export class EnrollmentsService {
  private readonly logger = new Logger(EnrollmentsService.name);

  constructor(
    @InjectRepository(CourseEnrollment)
    private enrollmentRepository: Repository<CourseEnrollment>,
    @InjectRepository(Course)
    private courseRepository: Repository<Course>,
    private usersService: UsersService,
  ) {}

  async enroll(caller: AuthUser, courseId: string): Promise<EnrollmentView> {
    const course = await this.courseRepository.findOne({ where: { id: courseId, is_published: true } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }

    if (caller.role !== 'Student') {
      throw new NotAStudentException();
    }

    const existing = await this.enrollmentRepository.findOne({
      where: { student_id: caller.sub, course_id: courseId },
    });
    if (existing) {
      throw new AlreadyEnrolledException();
    }

    if (course.max_students !== null && course.max_students !== undefined) {
      const activeCount = await this.enrollmentRepository.count({ where: { course_id: courseId, is_active: true } });
      if (activeCount >= course.max_students) {
        throw new CourseFullException();
      }
    }

    let enrollment: CourseEnrollment;
    try {
      enrollment = await this.enrollmentRepository.save(
        this.enrollmentRepository.create({
          student_id: caller.sub,
          course_id: courseId,
          status: 'enrolled',
          is_active: true,
          progress_percentage: 0,
          enrolled_at: new Date(),
        }),
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AlreadyEnrolledException();
      }
      throw error;
    }

    this.logger.log(`Student ${caller.sub} enrolled in course ${courseId}`);
    return toEnrollmentView(enrollment);
  }

  async unenroll(caller: AuthUser, courseId: string): Promise<EnrollmentView> {
    const enrollment = await this.enrollmentRepository.findOne({
      where: { student_id: caller.sub, course_id: courseId },
    });
    if (!enrollment) {
      throw new NotEnrolledException();
    }

    enrollment.is_active = false;
    enrollment.status = 'dropped';
    await this.enrollmentRepository.save(enrollment);

    this.logger.log(`Student ${caller.sub} dropped course ${courseId}`);
    return toEnrollmentView(enrollment);
  }

  async listMyEnrollments(caller: AuthUser, page?: number, pageSize?: number): Promise<PaginationResult<MyEnrollmentView>> {
    const options = PaginationUtil.validatePaginationOptions(page, pageSize);
    const [enrollments, total] = await this.enrollmentRepository.findAndCount({
      where: { student_id: caller.sub, is_active: true },
      order: { enrolled_at: 'DESC' },
      skip: PaginationUtil.getSkip(options.page, options.limit),
      take: options.limit,
    });

    const courseIds = enrollments.map((enrollment) => enrollment.course_id);
    const courses = courseIds.length ? await this.courseRepository.find({ where: { id: In(courseIds) } }) : [];
    const courseById = new Map(courses.map((course) => [course.id, course]));

    const data = enrollments.map((enrollment): MyEnrollmentView => {
      const course = courseById.get(enrollment.course_id);
      return {
        ...toEnrollmentView(enrollment),
        course: course
          ? {
              id: course.id,
              title: course.title,
              slug: course.slug,
              thumbnail_url: course.thumbnail_url ?? null,
              level: course.level,
            }
          : null,
      };
    });

    return PaginationUtil.createPaginationResult(data, total, options.page, options.limit);
  }

  async listCourseEnrollments(
    caller: AuthUser,
    courseId: string,
    page?: number,
    pageSize?: number,
  ): Promise<PaginationResult<CourseEnrollmentView>> {
    const course = await this.courseRepository.findOne({ where: { id: courseId } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }
    if (course.teacher_id !== caller.sub) {
      throw new PermissionDeniedException('Only the course teacher can view its enrollments');
    }

    const options = PaginationUtil.validatePaginationOptions(page, pageSize);
    const [enrollments, total] = await this.enrollmentRepository.findAndCount({
      where: { course_id: courseId },
      order: { enrolled_at: 'DESC' },
      skip: PaginationUtil.getSkip(options.page, options.limit),
      take: options.limit,
    });

    const students = await this.usersService.findSummaries(enrollments.map((enrollment) => enrollment.student_id));
    const data = enrollments.map((enrollment) => ({
      ...toEnrollmentView(enrollment),
      student: students.get(enrollment.student_id) ?? null,
    }));

    return PaginationUtil.createPaginationResult(data, total, options.page, options.limit);
  }

  findEnrollment(studentId: string, courseId: string): Promise<CourseEnrollment | null> {
    return this.enrollmentRepository.findOne({ where: { student_id: studentId, course_id: courseId } });
  }

  findActiveEnrollment(studentId: string, courseId: string): Promise<CourseEnrollment | null> {
    return this.enrollmentRepository.findOne({
      where: { student_id: studentId, course_id: courseId, is_active: true },
    });
  }

  async hasActiveEnrollment(caller: AuthUser | null, courseId: string): Promise<boolean> {
    if (!caller) {
      return false;
    }
    return (await this.findActiveEnrollment(caller.sub, courseId)) !== null;
  }

  saveEnrollment(enrollment: CourseEnrollment): Promise<CourseEnrollment> {
    return this.enrollmentRepository.save(enrollment);
  }

  /** Active enrollment counts keyed by course id. */
  async countActiveByCourse(courseIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>(courseIds.map((id) => [id, 0]));
    if (courseIds.length === 0) {
      return counts;
    }

    const rows = await this.enrollmentRepository.find({ where: { course_id: In(courseIds), is_active: true } });
    for (const row of rows) {
      counts.set(row.course_id, (counts.get(row.course_id) ?? 0) + 1);
    }
    return counts;
  }

  /** Ids among `courseIds` the caller is actively enrolled in. */
  async activeCourseIdsFor(caller: AuthUser | null, courseIds: string[]): Promise<Set<string>> {
    if (!caller || courseIds.length === 0) {
      return new Set();
    }
    const rows = await this.enrollmentRepository.find({
      where: { student_id: caller.sub, course_id: In(courseIds), is_active: true },
    });
    return new Set(rows.map((row) => row.course_id));
  }
}

export function toEnrollmentView(enrollment: CourseEnrollment): EnrollmentView {
  return {
    id: enrollment.id,
    course_id: enrollment.course_id,
    student_id: enrollment.student_id,
    status: enrollment.status,
    is_active: enrollment.is_active,
    progress_percentage: enrollment.progress_percentage,
    enrolled_at: enrollment.enrolled_at,
    completed_at: enrollment.completed_at ?? null,
    last_accessed_at: enrollment.last_accessed_at ?? null,
  };
}
