import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CoursesController } from './courses.controller';
import { CourseContentController } from './course-content.controller';
import { CoursesService } from './services/courses.service';
import { CourseContentService } from './services/course-content.service';
import { EnrollmentsService } from './services/enrollments.service';
import { ReviewsService } from './services/reviews.service';
import { Course, CourseEnrollment, CourseModule, CourseReview, Lesson } from './entities';
import { Category, CourseCategory } from '../categories/entities';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Course, CourseModule, Lesson, CourseEnrollment, CourseReview, Category, CourseCategory]),
    UsersModule,
  ],
  controllers: [CoursesController, CourseContentController],
  providers: [CoursesService, CourseContentService, EnrollmentsService, ReviewsService],
  exports: [CourseContentService, EnrollmentsService],
})
export class CoursesModule {}
