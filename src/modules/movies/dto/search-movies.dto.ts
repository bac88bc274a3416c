import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNumber, IsOptional, IsString } from 'class-validator';
import { MOVIE_SORT_FIELDS } from '../movie-query.builder';

export class SearchMoviesDto {
  @ApiPropertyOptional({ description: 'Genre, exact and case-insensitive', example: 'Sci-Fi' })
  @IsOptional()
  @IsString()
  genre?: string;

  @ApiPropertyOptional({ description: 'Title substring, case-insensitive', example: 'orbit' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiPropertyOptional({ description: 'Director substring, case-insensitive', example: 'lind' })
  @IsOptional()
  @IsString()
  director?: string;

  @ApiPropertyOptional({ description: 'Exact release year (1900 to current year + 5)', example: 2014 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  releaseYear?: number;

  @ApiPropertyOptional({ description: 'Earliest release year (inclusive)', example: 1990 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  yearMin?: number;

  @ApiPropertyOptional({ description: 'Latest release year (inclusive)', example: 2020 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  yearMax?: number;

  @ApiPropertyOptional({ description: 'Minimum rating 0.0-10.0 (inclusive)', example: 8.5 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  minRating?: number;

  @ApiPropertyOptional({ description: 'Maximum rating 0.0-10.0 (inclusive)', example: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  maxRating?: number;

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

  @ApiPropertyOptional({
    description: 'Sort field; unknown fields are rejected',
    enum: [...MOVIE_SORT_FIELDS],
    example: 'rating',
  })
  @IsOptional()
  @IsString()
  sortBy?: string;

  @ApiPropertyOptional({ description: 'asc (default) or desc', enum: ['asc', 'desc'], example: 'desc' })
  @IsOptional()
  @IsString()
  sortOrder?: string;
}
