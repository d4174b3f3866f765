export { LessonProgress } from './lesson-progress.entity';
