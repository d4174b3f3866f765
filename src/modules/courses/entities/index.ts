export { Course, CourseLevel, CourseCurrency, CourseLanguage, COURSE_LEVELS, COURSE_CURRENCIES, COURSE_LANGUAGES } from './course.entity';
export { CourseModule } from './course-module.entity';
export { Lesson, LessonType, LESSON_TYPES } from './lesson.entity';
export { CourseEnrollment, EnrollmentStatus } from './course-enrollment.entity';
export { CourseReview } from './course-review.entity';
