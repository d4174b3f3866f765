import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Course, CourseModule, Lesson, LessonType } from '../entities';
import { CreateLessonDto, CreateModuleDto, UpdateLessonDto, UpdateModuleDto } from '../dto';
import { EnrollmentsService } from './enrollments.service';
import {
  assertCourseAccess,
  canViewLessonContent,
  CourseAccessDecision,
  CourseAction,
} from '../policies/course-access.policy';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import { DuplicateOrderException, ResourceNotFoundException } from '../../../common/exceptions';
import { isUniqueViolation } from '../../../common/utils/database-error.util';

type AllowedDecision = CourseAccessDecision & { allowed: true };

export interface LessonView {
  id: string;
  module_id: string;
  title: string;
  description: string;
  lesson_type: LessonType;
  content: string | null;
  video_url: string | null;
  duration_minutes: number;
  order: number;
  is_published: boolean;
  is_free_preview: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface ModuleView {
  id: string;
  course_id: string;
  title: string;
  description: string;
  order: number;
  is_published: boolean;
  created_at: Date;
  updated_at: Date;
  lessons: LessonView[];
}

interface ModuleContext {
  course: Course;
  module: CourseModule;
}

interface LessonContext extends ModuleContext {
  lesson: Lesson;
}

/**
 * Modules and lessons of a course. Writes are reserved to the course
 * teacher; reads pass through the course access policy and hide drafts
 * from everyone but the teacher.
 */
@Injectable()
export class CourseContentService {
  private readonly logger = new Logger(CourseContentService.name);

  constructor(
    @InjectRepository(Course)
    private courseRepository: Repository<Course>,
    @InjectRepository(CourseModule)
    private moduleRepository: Repository<CourseModule>,
    @InjectRepository(Lesson)
    private lessonRepository: Repository<Lesson>,
    private enrollmentsService: EnrollmentsService,
  ) {}

  // Modules

  async listModules(caller: AuthUser | null, courseId: string): Promise<ModuleView[]> {
    const course = await this.requireCourse(courseId);
    const decision = await this.authorize(caller, course, 'read');
    return this.buildOutline(course, decision);
  }

  async getModule(caller: AuthUser | null, moduleId: string): Promise<ModuleView> {
    const { course, module } = await this.requireModule(moduleId);
    const decision = await this.authorize(caller, course, 'read', module);
    const lessons = await this.visibleLessons([module.id], decision);
    return toModuleView(module, lessons);
  }

  async createModule(caller: AuthUser | null, courseId: string, dto: CreateModuleDto): Promise<ModuleView> {
    const course = await this.requireCourse(courseId);
    await this.authorize(caller, course, 'create');

    const draft = this.moduleRepository.create({
      course_id: course.id,
      title: dto.title,
      description: dto.description ?? '',
      order: dto.order,
      is_published: dto.is_published ?? false,
      created_at: new Date(),
    });
    const module = await this.guardOrder('course', () => this.moduleRepository.save(draft));

    this.logger.log(`Module ${module.id} created in course ${course.id}`);
    return toModuleView(module, []);
  }

  async updateModule(caller: AuthUser | null, moduleId: string, dto: UpdateModuleDto): Promise<ModuleView> {
    const { course, module } = await this.requireModule(moduleId);
    const decision = await this.authorize(caller, course, 'update', module);

    Object.assign(module, dto);
    await this.guardOrder('course', () => this.moduleRepository.save(module));

    this.logger.log(`Module ${module.id} updated`);
    return toModuleView(module, await this.visibleLessons([module.id], decision));
  }

  async deleteModule(caller: AuthUser | null, moduleId: string): Promise<void> {
    const { course, module } = await this.requireModule(moduleId);
    await this.authorize(caller, course, 'delete', module);

    await this.moduleRepository.remove(module);
    this.logger.log(`Module ${moduleId} deleted from course ${course.id}`);
  }

  // Lessons

  async listLessons(caller: AuthUser | null, moduleId: string): Promise<LessonView[]> {
    const { course, module } = await this.requireModule(moduleId);
    const decision = await this.authorize(caller, course, 'read', module);
    return this.visibleLessons([module.id], decision);
  }

  async getLesson(caller: AuthUser | null, lessonId: string): Promise<LessonView> {
    const { course, module, lesson } = await this.requireLesson(lessonId);
    const decision = await this.authorize(caller, course, 'read', module, lesson);
    return toLessonView(lesson, canViewLessonContent(decision, lesson));
  }

  async createLesson(caller: AuthUser | null, moduleId: string, dto: CreateLessonDto): Promise<LessonView> {
    const { course, module } = await this.requireModule(moduleId);
    await this.authorize(caller, course, 'create', module);

    const draft = this.lessonRepository.create({
      module_id: module.id,
      title: dto.title,
      description: dto.description ?? '',
      lesson_type: dto.lesson_type ?? 'video',
      content: dto.content ?? '',
      video_url: dto.video_url ?? null,
      duration_minutes: dto.duration_minutes ?? 0,
      order: dto.order,
      is_published: dto.is_published ?? false,
      is_free_preview: dto.is_free_preview ?? false,
      created_at: new Date(),
    });
    const lesson = await this.guardOrder('module', () => this.lessonRepository.save(draft));

    this.logger.log(`Lesson ${lesson.id} created in module ${module.id}`);
    return toLessonView(lesson, true);
  }

  async updateLesson(caller: AuthUser | null, lessonId: string, dto: UpdateLessonDto): Promise<LessonView> {
    const { course, module, lesson } = await this.requireLesson(lessonId);
    await this.authorize(caller, course, 'update', module, lesson);

    Object.assign(lesson, dto);
    await this.guardOrder('module', () => this.lessonRepository.save(lesson));

    this.logger.log(`Lesson ${lesson.id} updated`);
    return toLessonView(lesson, true);
  }

  async deleteLesson(caller: AuthUser | null, lessonId: string): Promise<void> {
    const { course, module, lesson } = await this.requireLesson(lessonId);
    await this.authorize(caller, course, 'delete', module, lesson);

    await this.lessonRepository.remove(lesson);
    this.logger.log(`Lesson ${lessonId} deleted from module ${module.id}`);
  }

  /**
   * Modules and lessons of a course as seen through `decision`: drafts are
   * dropped unless the caller owns the course.
   */
  async buildOutline(course: Course, decision: AllowedDecision): Promise<ModuleView[]> {
    const modules = await this.moduleRepository.find({
      where: decision.via === 'owner' ? { course_id: course.id } : { course_id: course.id, is_published: true },
      order: { order: 'ASC', created_at: 'ASC' },
    });

    const lessons = await this.visibleLessons(modules.map((module) => module.id), decision);
    return modules.map((module) =>
      toModuleView(
        module,
        lessons.filter((lesson) => lesson.module_id === module.id),
      ),
    );
  }

  /** Ids of every lesson in the course, drafts included. */
  async lessonIdsOfCourse(courseId: string): Promise<string[]> {
    const modules = await this.moduleRepository.find({ where: { course_id: courseId } });
    if (modules.length === 0) {
      return [];
    }
    const lessons = await this.lessonRepository.find({ where: { module_id: In(modules.map((module) => module.id)) } });
    return lessons.map((lesson) => lesson.id);
  }

  async requireLesson(lessonId: string): Promise<LessonContext> {
    const lesson = await this.lessonRepository.findOne({ where: { id: lessonId } });
    if (!lesson) {
      throw new ResourceNotFoundException('Lesson');
    }
    const { course, module } = await this.requireModule(lesson.module_id);
    return { course, module, lesson };
  }

  private async visibleLessons(moduleIds: string[], decision: AllowedDecision): Promise<LessonView[]> {
    if (moduleIds.length === 0) {
      return [];
    }
    const lessons = await this.lessonRepository.find({
      where:
        decision.via === 'owner'
          ? { module_id: In(moduleIds) }
          : { module_id: In(moduleIds), is_published: true },
      order: { order: 'ASC', created_at: 'ASC' },
    });
    return lessons.map((lesson) => toLessonView(lesson, canViewLessonContent(decision, lesson)));
  }

  private async authorize(
    caller: AuthUser | null,
    course: Course,
    action: CourseAction,
    module?: CourseModule,
    lesson?: Lesson,
  ): Promise<AllowedDecision> {
    return assertCourseAccess({
      actor: caller,
      action,
      resource: {
        teacherId: course.teacher_id,
        coursePublished: course.is_published,
        modulePublished: module?.is_published,
        lessonPublished: lesson?.is_published,
      },
      hasActiveEnrollment: await this.enrollmentsService.hasActiveEnrollment(caller, course.id),
    });
  }

  private async requireCourse(courseId: string): Promise<Course> {
    const course = await this.courseRepository.findOne({ where: { id: courseId } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }
    return course;
  }

  private async requireModule(moduleId: string): Promise<ModuleContext> {
    const module = await this.moduleRepository.findOne({ where: { id: moduleId } });
    if (!module) {
      throw new ResourceNotFoundException('Module');
    }
    return { course: await this.requireCourse(module.course_id), module };
  }

  private async guardOrder<T>(parent: string, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateOrderException(parent);
      }
      throw error;
    }
  }
}

export function toLessonView(lesson: Lesson, showContent: boolean): LessonView {
  return {
    id: lesson.id,
    module_id: lesson.module_id,
    title: lesson.title,
    description: lesson.description,
    lesson_type: lesson.lesson_type,
    content: showContent ? lesson.content : null,
    video_url: showContent ? lesson.video_url ?? null : null,
    duration_minutes: lesson.duration_minutes,
    order: lesson.order,
    is_published: lesson.is_published,
    is_free_preview: lesson.is_free_preview,
    created_at: lesson.created_at,
    updated_at: lesson.updated_at,
  };
}

function toModuleView(module: CourseModule, lessons: LessonView[]): ModuleView {
  return {
    id: module.id,
    course_id: module.course_id,
    title: module.title,
    description: module.description,
    order: module.order,
    is_published: module.is_published,
    created_at: module.created_at,
    updated_at: module.updated_at,
    lessons,
  };
}
