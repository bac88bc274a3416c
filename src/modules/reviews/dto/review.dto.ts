import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNumber, IsOptional, IsString } from 'class-validator';

// Only shapes are checked here; ranges and lengths belong to validateReviewInput.
export class ReviewDto {
  @ApiProperty({ description: 'Reviewer name', example: 'jdoe', maxLength: 100 })
  @IsOptional()
  @IsString()
  user_name?: string;

  @ApiPropertyOptional({
    description: 'Review content',
    example: 'Tense, patient and beautifully shot.',
    maxLength: 2000,
    nullable: true,
  })
  @IsOptional()
  @IsString()
  review_text?: string | null;

  @ApiProperty({ description: 'Score between 1.0 and 10.0', example: 8.5, minimum: 1, maximum: 10 })
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  rating?: number;
}

export class ReviewResponseDto {
  @ApiProperty({ example: 3 })
  id!: number;

  @ApiProperty({ example: 1 })
  movieId!: number;

  @ApiProperty({ example: 'jdoe' })
  user_name!: string;

  @ApiPropertyOptional({ example: 'Tense, patient and beautifully shot.', nullable: true })
  review_text!: string | null;

  @ApiProperty({ example: 8.5 })
  rating!: number;

  @ApiProperty()
  created_at!: Date;

  @ApiProperty()
  updated_at!: Date;
}
