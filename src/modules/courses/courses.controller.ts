import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { CoursesService } from './services/courses.service';
import { EnrollmentsService } from './services/enrollments.service';
import { ReviewsService } from './services/reviews.service';
import {
  CreateCourseDto,
  CreateReviewDto,
  ListCoursesQueryDto,
  PageQueryDto,
  UpdateCourseDto,
  UpdateReviewDto,
} from './dto';
import { CurrentUser, Public, Roles } from '../../common/decorators';
import { AuthUser, requireUser } from '../auth/interfaces/auth-user.interface';

@ApiTags('Courses')
@Controller('courses')
export class CoursesController {
  constructor(
    private readonly coursesService: CoursesService,
    private readonly enrollmentsService: EnrollmentsService,
    private readonly reviewsService: ReviewsService,
  ) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Browse published courses' })
  @ApiResponse({ status: 200, description: 'Paginated course list' })
  async listCourses(@Query() query: ListCoursesQueryDto, @CurrentUser() user: AuthUser | null) {
    return this.coursesService.listCourses(query, user);
  }

  @Post()
  @Roles('Teacher')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Create a course' })
  @ApiResponse({ status: 201, description: 'Course created' })
  @ApiResponse({ status: 403, description: 'Teacher role required' })
  async createCourse(@CurrentUser() user: AuthUser | null, @Body() dto: CreateCourseDto) {
    return this.coursesService.createCourse(requireUser(user), dto);
  }

  @Get('my/teaching')
  @Roles('Teacher')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Courses taught by the current teacher' })
  @ApiResponse({ status: 200, description: 'Paginated course list' })
  async listMyTeaching(@CurrentUser() user: AuthUser | null, @Query() query: PageQueryDto) {
    return this.coursesService.listMyTeachingCourses(requireUser(user), query.page, query.page_size);
  }

  @Get('my/enrolled')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Active enrollments of the current user' })
  @ApiResponse({ status: 200, description: 'Paginated enrollment list' })
  async listMyEnrollments(@CurrentUser() user: AuthUser | null, @Query() query: PageQueryDto) {
    return this.enrollmentsService.listMyEnrollments(requireUser(user), query.page, query.page_size);
  }

  @Public()
  @Get(':slug')
  @ApiOperation({ summary: 'Course detail with its visible modules and lessons' })
  @ApiResponse({ status: 200, description: 'Course detail' })
  @ApiResponse({ status: 404, description: 'Course not found' })
  async getCourse(@Param('slug') slug: string, @CurrentUser() user: AuthUser | null) {
    return this.coursesService.getCourseBySlug(slug, user);
  }

  @Put(':slug')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a course (teacher only)' })
  @ApiResponse({ status: 200, description: 'Course updated' })
  @ApiResponse({ status: 403, description: 'Permission denied' })
  async updateCourse(
    @Param('slug') slug: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: UpdateCourseDto,
  ) {
    return this.coursesService.updateCourse(slug, user, dto);
  }

  @Delete(':slug')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete a course and all of its content (teacher only)' })
  @ApiResponse({ status: 204, description: 'Course deleted' })
  @ApiResponse({ status: 403, description: 'Permission denied' })
  async deleteCourse(@Param('slug') slug: string, @CurrentUser() user: AuthUser | null) {
    await this.coursesService.deleteCourse(slug, user);
  }

  @Post(':id/enroll')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Enroll the current student' })
  @ApiResponse({ status: 201, description: 'Enrolled' })
  @ApiResponse({ status: 403, description: 'Only students can enroll' })
  @ApiResponse({ status: 409, description: 'Already enrolled or course full' })
  async enroll(@Param('id', ParseUUIDPipe) courseId: string, @CurrentUser() user: AuthUser | null) {
    return this.enrollmentsService.enroll(requireUser(user), courseId);
  }

  @Post(':id/unenroll')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Drop the course' })
  @ApiResponse({ status: 200, description: 'Enrollment dropped' })
  @ApiResponse({ status: 403, description: 'Not enrolled' })
  async unenroll(@Param('id', ParseUUIDPipe) courseId: string, @CurrentUser() user: AuthUser | null) {
    return this.enrollmentsService.unenroll(requireUser(user), courseId);
  }

  @Get(':id/enrollments')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Enrollments of a course (teacher only)' })
  @ApiResponse({ status: 200, description: 'Paginated enrollment list' })
  @ApiResponse({ status: 403, description: 'Permission denied' })
  async listCourseEnrollments(
    @Param('id', ParseUUIDPipe) courseId: string,
    @CurrentUser() user: AuthUser | null,
    @Query() query: PageQueryDto,
  ) {
    return this.enrollmentsService.listCourseEnrollments(requireUser(user), courseId, query.page, query.page_size);
  }

  @Public()
  @Get(':id/reviews')
  @ApiOperation({ summary: 'Published reviews of a course, newest first' })
  @ApiResponse({ status: 200, description: 'Paginated review list' })
  async listReviews(@Param('id', ParseUUIDPipe) courseId: string, @Query() query: PageQueryDto) {
    return this.reviewsService.listReviews(courseId, query.page, query.page_size);
  }

  @Post(':id/reviews')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Review a course the current user is enrolled in' })
  @ApiResponse({ status: 201, description: 'Review created' })
  @ApiResponse({ status: 403, description: 'Not enrolled' })
  @ApiResponse({ status: 409, description: 'Already reviewed' })
  async addReview(
    @Param('id', ParseUUIDPipe) courseId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: CreateReviewDto,
  ) {
    return this.reviewsService.addReview(requireUser(user), courseId, dto);
  }

  @Put('reviews/:reviewId')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Edit your review' })
  @ApiResponse({ status: 200, description: 'Review updated' })
  @ApiResponse({ status: 403, description: 'Not the author' })
  async updateReview(
    @Param('reviewId', ParseUUIDPipe) reviewId: string,
    @CurrentUser() user: AuthUser | null,
    @Body() dto: UpdateReviewDto,
  ) {
    return this.reviewsService.updateReview(requireUser(user), reviewId, dto);
  }

  @Delete('reviews/:reviewId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete your review' })
  @ApiResponse({ status: 204, description: 'Review deleted' })
  @ApiResponse({ status: 403, description: 'Not the author' })
  async deleteReview(@Param('reviewId', ParseUUIDPipe) reviewId: string, @CurrentUser() user: AuthUser | null) {
    await this.reviewsService.deleteReview(requireUser(user), reviewId);
  }
}
