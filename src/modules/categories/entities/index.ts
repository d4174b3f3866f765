export { Category } from './category.entity';
export { CourseCategory } from './course-category.entity';
