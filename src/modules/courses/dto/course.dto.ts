import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  IsUUID,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import {
  COURSE_CURRENCIES,
  COURSE_LANGUAGES,
  COURSE_LEVELS,
  CourseCurrency,
  CourseLanguage,
  CourseLevel,
} from '../entities/course.entity';

export class CreateCourseDto {
  @ApiProperty({ description: 'Course title', example: 'Intro to Python' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  title!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ enum: COURSE_LANGUAGES, default: 'en' })
  @IsOptional()
  @IsIn(COURSE_LANGUAGES)
  language?: CourseLanguage;

  @ApiPropertyOptional({ minimum: 0, default: 0 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number;

  @ApiPropertyOptional({ enum: COURSE_CURRENCIES, default: 'USD' })
  @IsOptional()
  @IsIn(COURSE_CURRENCIES)
  currency?: CourseCurrency;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_free?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_published?: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl()
  @MaxLength(500)
  thumbnail_url?: string;

  @ApiPropertyOptional({ enum: COURSE_LEVELS, default: 'beginner' })
  @IsOptional()
  @IsIn(COURSE_LEVELS)
  level?: CourseLevel;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  duration_hours?: number;

  @ApiPropertyOptional({ minimum: 1, description: 'Enrollment cap; unlimited when omitted' })
  @IsOptional()
  @IsInt()
  @Min(1)
  max_students?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  prerequisites?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  learning_objectives?: string;

  @ApiPropertyOptional({ description: 'Comma separated tags' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  tags?: string;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsUUID('4', { each: true })
  category_ids?: string[];
}

export class UpdateCourseDto extends PartialType(CreateCourseDto) {}

export const COURSE_SORTS = ['newest', 'popular', 'rating', 'price_low', 'price_high'] as const;
export type CourseSort = (typeof COURSE_SORTS)[number];

export class ListCoursesQueryDto {
  @ApiPropertyOptional({ description: 'Matches title, description and tags' })
  @IsOptional()
  @IsString()
  search?: string;

  @ApiPropertyOptional({ description: 'Category title' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ enum: COURSE_LEVELS })
  @IsOptional()
  @IsIn(COURSE_LEVELS)
  level?: CourseLevel;

  @ApiPropertyOptional({ enum: COURSE_LANGUAGES })
  @IsOptional()
  @IsIn(COURSE_LANGUAGES)
  language?: CourseLanguage;

  @ApiPropertyOptional({ enum: ['free', 'paid'] })
  @IsOptional()
  @IsIn(['free', 'paid'])
  price?: 'free' | 'paid';

  @ApiPropertyOptional({ description: 'Teacher user id' })
  @IsOptional()
  @IsUUID()
  teacher?: string;

  @ApiPropertyOptional({ enum: COURSE_SORTS, default: 'newest' })
  @IsOptional()
  @IsIn(COURSE_SORTS)
  sort?: CourseSort;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({ default: 12, maximum: 50 })
  @IsOptional()
  @IsInt()
  @Min(1)
  page_size?: number;
}

export class PageQueryDto {
  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  page?: number;

  @ApiPropertyOptional({ default: 12, maximum: 50 })
  @IsOptional()
  @IsInt()
  @Min(1)
  page_size?: number;
}
