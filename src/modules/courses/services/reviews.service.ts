import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Course, CourseReview } from '../entities';
import { CreateReviewDto, UpdateReviewDto } from '../dto';
import { EnrollmentsService } from './enrollments.service';
import { UsersService } from '../../users/services/users.service';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';
import {
  DuplicateReviewException,
  NotEnrolledException,
  PermissionDeniedException,
  ResourceNotFoundException,
} from '../../../common/exceptions';
import { isUniqueViolation } from '../../../common/utils/database-error.util';
import { PaginationResult, PaginationUtil } from '../../../common/utils/pagination.util';

export interface ReviewView {
  id: string;
  course_id: string;
  student_id: string;
  student_name: string;
  rating: number;
  review_text: string;
  created_at: Date;
  updated_at: Date;
}

export interface RatingSummary {
  average_rating: number;
  reviews_count: number;
}

/** Mean rounded to one decimal place; 0 when there are no ratings. */
export function averageRating(ratings: number[]): number {
  if (ratings.length === 0) {
    return 0;
  }
  const mean = ratings.reduce((sum, rating) => sum + rating, 0) / ratings.length;
  return Math.round(mean * 10) / 10;
}

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    @InjectRepository(CourseReview)
    private reviewRepository: Repository<CourseReview>,
    @InjectRepository(Course)
    private courseRepository: Repository<Course>,
    private enrollmentsService: EnrollmentsService,
    private usersService: UsersService,
  ) {}

  async addReview(caller: AuthUser, courseId: string, dto: CreateReviewDto): Promise<ReviewView> {
    await this.requireCourse(courseId);

    if (!(await this.enrollmentsService.hasActiveEnrollment(caller, courseId))) {
      throw new NotEnrolledException('You must be enrolled in this course to review it');
    }

    const existing = await this.reviewRepository.findOne({ where: { course_id: courseId, student_id: caller.sub } });
    if (existing) {
      throw new DuplicateReviewException();
    }

    let review: CourseReview;
    try {
      review = await this.reviewRepository.save(
        this.reviewRepository.create({
          course_id: courseId,
          student_id: caller.sub,
          rating: dto.rating,
          review_text: dto.review_text ?? '',
          is_published: true,
          created_at: new Date(),
        }),
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateReviewException();
      }
      throw error;
    }

    this.logger.log(`Review ${review.id} added to course ${courseId} by ${caller.sub}`);
    return this.toView(review);
  }

  async listReviews(courseId: string, page?: number, pageSize?: number): Promise<PaginationResult<ReviewView>> {
    await this.requireCourse(courseId);

    const options = PaginationUtil.validatePaginationOptions(page, pageSize);
    const [reviews, total] = await this.reviewRepository.findAndCount({
      where: { course_id: courseId, is_published: true },
      order: { created_at: 'DESC' },
      skip: PaginationUtil.getSkip(options.page, options.limit),
      take: options.limit,
    });

    const students = await this.usersService.findSummaries(reviews.map((review) => review.student_id));
    const data = reviews.map((review) => this.toView(review, students.get(review.student_id)?.full_name));

    return PaginationUtil.createPaginationResult(data, total, options.page, options.limit);
  }

  async updateReview(caller: AuthUser, reviewId: string, dto: UpdateReviewDto): Promise<ReviewView> {
    const review = await this.requireOwnReview(caller, reviewId);

    if (dto.rating !== undefined) {
      review.rating = dto.rating;
    }
    if (dto.review_text !== undefined) {
      review.review_text = dto.review_text;
    }
    await this.reviewRepository.save(review);

    this.logger.log(`Review ${reviewId} updated`);
    return this.toView(review);
  }

  async deleteReview(caller: AuthUser, reviewId: string): Promise<void> {
    const review = await this.requireOwnReview(caller, reviewId);
    await this.reviewRepository.remove(review);
    this.logger.log(`Review ${reviewId} deleted`);
  }

  /** Published-rating summaries keyed by course id. */
  async summarize(courseIds: string[]): Promise<Map<string, RatingSummary>> {
    const ratings = new Map<string, number[]>(courseIds.map((id) => [id, []]));
    if (courseIds.length > 0) {
      const reviews = await this.reviewRepository.find({
        where: { course_id: In(courseIds), is_published: true },
      });
      for (const review of reviews) {
        ratings.get(review.course_id)?.push(review.rating);
      }
    }

    const summaries = new Map<string, RatingSummary>();
    for (const [courseId, values] of ratings) {
      summaries.set(courseId, { average_rating: averageRating(values), reviews_count: values.length });
    }
    return summaries;
  }

  private async requireCourse(courseId: string): Promise<Course> {
    const course = await this.courseRepository.findOne({ where: { id: courseId } });
    if (!course) {
      throw new ResourceNotFoundException('Course');
    }
    return course;
  }

  private async requireOwnReview(caller: AuthUser, reviewId: string): Promise<CourseReview> {
    const review = await this.reviewRepository.findOne({ where: { id: reviewId } });
    if (!review) {
      throw new ResourceNotFoundException('Review');
    }
    if (review.student_id !== caller.sub) {
      throw new PermissionDeniedException('You can only modify your own reviews');
    }
    return review;
  }

  private toView(review: CourseReview, studentName?: string): ReviewView {
    return {
      id: review.id,
      course_id: review.course_id,
      student_id: review.student_id,
      student_name: studentName ?? '',
      rating: review.rating,
      review_text: review.review_text,
      created_at: review.created_at,
      updated_at: review.updated_at,
    };
  }
}
