import { Type } from 'class-transformer';
import { IsInt, IsOptional, Matches, Min, IsISO8601 } from 'class-validator';

export class RecommendationsQuery {
  // Defaults to today
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  expiringDays: number = 14;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  staleDays: number = 30;

  // Zero or negative yields an empty list
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  limit: number = 50;
}

export class CheckBatchDto {
  // Defaults to now
  @IsOptional()
  @IsISO8601({ strict: true })
  checkedAt?: string;
}
