import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ProgressController } from './progress.controller';
import { ProgressService } from './services/progress.service';
import { LessonProgress } from './entities';
import { CoursesModule } from '../courses/courses.module';

@Module({
  imports: [TypeOrmModule.forFeature([LessonProgress]), CoursesModule],
  controllers: [ProgressController],
  providers: [ProgressService],
})
export class ProgressModule {}
