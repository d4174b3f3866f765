import { IsBoolean, IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RecordLessonProgressDto {
  @ApiPropertyOptional({ minimum: 0, maximum: 100, description: 'Replaces the stored percentage when given' })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  completion_percentage?: number;

  @ApiPropertyOptional({ minimum: 0, maximum: 1440, default: 0, description: 'Minutes added to the running total' })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(1440)
  time_spent_minutes?: number;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  is_completed?: boolean;
}
