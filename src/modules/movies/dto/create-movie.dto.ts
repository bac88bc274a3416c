import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString } from 'class-validator';

// rating is derived from reviews and never accepted here.
export class CreateMovieDto {
  @ApiProperty({ description: 'Movie title', example: 'The Quiet Orbit', maxLength: 255 })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiProperty({ description: 'Director', example: 'Mara Lindqvist', maxLength: 255 })
  @IsOptional()
  @IsString()
  director?: string;

  @ApiProperty({ description: 'Genre', example: 'Sci-Fi', maxLength: 100 })
  @IsOptional()
  @IsString()
  genre?: string;

  @ApiProperty({ description: 'Release year (1888 to current year + 5)', example: 2014 })
  @IsOptional()
  @IsInt()
  release_year?: number;
}
