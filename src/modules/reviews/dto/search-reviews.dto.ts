import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNumber, IsOptional, IsString } from 'class-validator';

export const REVIEW_SORT_FIELDS = ['rating', 'createdAt', 'userName', 'id'] as const;
export type ReviewSortField = (typeof REVIEW_SORT_FIELDS)[number];

export class PageQueryDto {
  @ApiPropertyOptional({ description: 'Page index (0-based)', minimum: 0, example: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  page?: number;

  @ApiPropertyOptional({ description: 'Page size, clamped into 1-100', example: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  size?: number;
}

export class SearchReviewsDto extends PageQueryDto {
  @ApiPropertyOptional({ description: 'Minimum review score (inclusive)', example: 7 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  minRating?: number;

  @ApiPropertyOptional({ description: 'Maximum review score (inclusive)', example: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  maxRating?: number;

  @ApiPropertyOptional({ description: 'Reviewer name substring (case-insensitive)', example: 'doe' })
  @IsOptional()
  @IsString()
  userName?: string;

  @ApiPropertyOptional({ description: 'Created at or after (ISO-8601)', example: '2024-01-01T00:00:00Z' })
  @IsOptional()
  @IsString()
  startDate?: string;

  @ApiPropertyOptional({ description: 'Created at or before (ISO-8601)', example: '2024-12-31T23:59:59Z' })
  @IsOptional()
  @IsString()
  endDate?: string;

  @ApiPropertyOptional({ enum: [...REVIEW_SORT_FIELDS], example: 'createdAt' })
  @IsOptional()
  @IsString()
  sortBy?: string;

  @ApiPropertyOptional({ enum: ['asc', 'desc'], example: 'desc' })
  @IsOptional()
  @IsString()
  sortOrder?: string;
}
