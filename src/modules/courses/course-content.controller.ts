import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { CourseContentService } from './services/course-content.service';
import { CreateLessonDto, CreateModuleDto, UpdateLessonDto, UpdateModuleDto } from './dto';
import { CurrentUser, Public } from '../../common/decorators';
import { AuthUser } from '../auth/interfaces/auth-user.interface';

/**
 * Modules and lessons. Reads are public routes so anonymous callers reach
 * the access policy; writes require a bearer token.
 */
@ApiTags('Course content')
@Controller('courses')
export class CourseContentController {
  constructor(private readonly contentService: CourseContentService) {}

  @Public()
  @Get(':courseId/modules')
  @ApiOperation({ summary: 'Modules of a course with their lessons' })
  @ApiResponse({ status: 200, description: 'Module list' })
  async listModules(@Param('courseId', ParseUUIDPipe) courseId: string, @CurrentUser() user: AuthUser | null) {
    return this.contentService.listModules(user, courseId);
  }

  @Post(':courseId/modules')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Add a module (course teacher only)' })
  @ApiResponse({ status: 201, description: 'Module created' })
  @ApiResponse({ status: 409, description: 'Order already used in this course' })
  async createModule(
    @Param('courseId', ParseUUIDPipe) courseId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: CreateModuleDto,
  ) {
    return this.contentService.createModule(user, courseId, dto);
  }

  @Public()
  @Get('modules/:moduleId')
  @ApiOperation({ summary: 'Module detail' })
  @ApiResponse({ status: 200, description: 'Module with lessons' })
  async getModule(@Param('moduleId', ParseUUIDPipe) moduleId: string, @CurrentUser() user: AuthUser | null) {
    return this.contentService.getModule(user, moduleId);
  }

  @Put('modules/:moduleId')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a module (course teacher only)' })
  @ApiResponse({ status: 200, description: 'Module updated' })
  async updateModule(
    @Param('moduleId', ParseUUIDPipe) moduleId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: UpdateModuleDto,
  ) {
    return this.contentService.updateModule(user, moduleId, dto);
  }

  @Delete('modules/:moduleId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete a module and its lessons (course teacher only)' })
  @ApiResponse({ status: 204, description: 'Module deleted' })
  async deleteModule(@Param('moduleId', ParseUUIDPipe) moduleId: string, @CurrentUser() user: AuthUser | null) {
    await this.contentService.deleteModule(user, moduleId);
  }

  @Public()
  @Get('modules/:moduleId/lessons')
  @ApiOperation({ summary: 'Lessons of a module' })
  @ApiResponse({ status: 200, description: 'Lesson list' })
  async listLessons(@Param('moduleId', ParseUUIDPipe) moduleId: string, @CurrentUser() user: AuthUser | null) {
    return this.contentService.listLessons(user, moduleId);
  }

  @Post('modules/:moduleId/lessons')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Add a lesson (course teacher only)' })
  @ApiResponse({ status: 201, description: 'Lesson created' })
  @ApiResponse({ status: 409, description: 'Order already used in this module' })
  async createLesson(
    @Param('moduleId', ParseUUIDPipe) moduleId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: CreateLessonDto,
  ) {
    return this.contentService.createLesson(user, moduleId, dto);
  }

  @Public()
  @Get('lessons/:lessonId')
  @ApiOperation({ summary: 'Lesson detail; body hidden unless enrolled, owner or free preview' })
  @ApiResponse({ status: 200, description: 'Lesson' })
  async getLesson(@Param('lessonId', ParseUUIDPipe) lessonId: string, @CurrentUser() user: AuthUser | null) {
    return this.contentService.getLesson(user, lessonId);
  }

  @Put('lessons/:lessonId')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a lesson (course teacher only)' })
  @ApiResponse({ status: 200, description: 'Lesson updated' })
  async updateLesson(
    @Param('lessonId', ParseUUIDPipe) lessonId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: UpdateLessonDto,
  ) {
    return this.contentService.updateLesson(user, lessonId, dto);
  }

  @Delete('lessons/:lessonId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete a lesson (course teacher only)' })
  @ApiResponse({ status: 204, description: 'Lesson deleted' })
  async deleteLesson(@Param('lessonId', ParseUUIDPipe) lessonId: string, @CurrentUser() user: AuthUser | null) {
    await this.contentService.deleteLesson(user, lessonId);
  }
}
