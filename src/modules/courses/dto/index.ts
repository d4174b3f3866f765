export * from './course.dto';
export * from './content.dto';
export * from './review.dto';
