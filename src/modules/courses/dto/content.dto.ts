import { IsBoolean, IsIn, IsInt, IsOptional, IsString, IsUrl, MaxLength, Min, MinLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { LESSON_TYPES, LessonType } from '../entities/lesson.entity';

export class CreateModuleDto {
  @ApiProperty()
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  title!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiProperty({ minimum: 0, description: 'Position inside the course; unique per course' })
  @IsInt()
  @Min(0)
  order!: number;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_published?: boolean;
}

export class UpdateModuleDto extends PartialType(CreateModuleDto) {}

export class CreateLessonDto {
  @ApiProperty()
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  title!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ enum: LESSON_TYPES, default: 'video' })
  @IsOptional()
  @IsIn(LESSON_TYPES)
  lesson_type?: LessonType;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  content?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUrl()
  @MaxLength(500)
  video_url?: string;

  @ApiPropertyOptional({ minimum: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  duration_minutes?: number;

  @ApiProperty({ minimum: 0, description: 'Position inside the module; unique per module' })
  @IsInt()
  @Min(0)
  order!: number;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_published?: boolean;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_free_preview?: boolean;
}

export class UpdateLessonDto extends PartialType(CreateLessonDto) {}
