import { Controller, Get, Post, Body, Param, HttpCode, HttpStatus, ParseUUIDPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { ProgressService } from './services/progress.service';
import { RecordLessonProgressDto } from './dto';
import { CurrentUser } from '../../common/decorators';
import { AuthUser, requireUser } from '../auth/interfaces/auth-user.interface';

@ApiTags('Progress')
@ApiBearerAuth()
@Controller()
export class ProgressController {
  constructor(private readonly progressService: ProgressService) {}

  @Post('lessons/:id/progress')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Record progress on a lesson' })
  @ApiResponse({ status: 200, description: 'Lesson and course progress' })
  @ApiResponse({ status: 403, description: 'Not enrolled in the course' })
  @ApiResponse({ status: 404, description: 'Lesson not found' })
  async recordLessonProgress(
    @Param('id', ParseUUIDPipe) lessonId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: RecordLessonProgressDto,
  ) {
    return this.progressService.recordLessonProgress(requireUser(user), lessonId, dto);
  }

  @Get('courses/:id/progress')
  @ApiOperation({ summary: 'Progress of the current user in a course' })
  @ApiResponse({ status: 200, description: 'Enrollment progress with per-lesson rows' })
  @ApiResponse({ status: 403, description: 'Not enrolled in the course' })
  async getCourseProgress(@Param('id', ParseUUIDPipe) courseId: string, @CurrentUser() user: AuthUser | null) {
    return this.progressService.getCourseProgress(requireUser(user), courseId);
  }
}
