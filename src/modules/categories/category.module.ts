import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CategoryController } from './category.controller';
import { CategoryService } from './services/category.service';
import { Category, CourseCategory } from './entities';
import { Course } from '../courses/entities/course.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Category, CourseCategory, Course])],
  controllers: [CategoryController],
  providers: [CategoryService],
})
export class CategoryModule {}
