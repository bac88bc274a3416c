import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOkResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ReviewsService, type ReviewResponse } from './reviews.service';
import { ReviewDto, ReviewResponseDto } from './dto/review.dto';
import { PageQueryDto, SearchReviewsDto } from './dto/search-reviews.dto';
import type { Page } from '../../common/pagination/page';

const REVIEW_NOT_FOUND_EXAMPLE = {
  statusCode: 404,
  error: 'Review Not Found',
  message: 'Review with ID 5 not found for movie with ID 2',
};

const INVALID_REVIEW_EXAMPLE = {
  statusCode: 400,
  error: 'Invalid Review Data',
  message: "Invalid value for field 'rating': 11. Rating cannot exceed 10.0",
  field: 'rating',
};

@ApiTags('reviews')
@Controller('movies/:movieId/reviews')
export class MovieReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  @Post()
  @ApiOperation({
    summary: 'Add a review to a movie',
    description: "Creates the review and recomputes the movie's rating in the same transaction.",
  })
  @ApiBody({ type: ReviewDto })
  @ApiResponse({ status: 201, description: 'Review created', type: ReviewResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid review data', schema: { example: INVALID_REVIEW_EXAMPLE } })
  @ApiResponse({ status: 404, description: 'Movie not found' })
  add(
    @Param('movieId', ParseIntPipe) movieId: number,
    @Body() dto: ReviewDto,
  ): Promise<ReviewResponse> {
    return this.reviewsService.addReview(movieId, dto);
  }

  @Get()
  @ApiOperation({ summary: 'List all reviews of a movie' })
  @ApiOkResponse({ type: ReviewResponseDto, isArray: true })
  @ApiResponse({ status: 404, description: 'Movie not found' })
  list(@Param('movieId', ParseIntPipe) movieId: number): Promise<ReviewResponse[]> {
    return this.reviewsService.getReviewsForMovie(movieId);
  }

  @Get(':reviewId')
  @ApiOperation({
    summary: 'Get one review of a movie',
    description: 'A review that exists but belongs to another movie is reported as not found.',
  })
  @ApiOkResponse({ type: ReviewResponseDto })
  @ApiResponse({ status: 404, description: 'Movie or review not found', schema: { example: REVIEW_NOT_FOUND_EXAMPLE } })
  findOne(
    @Param('movieId', ParseIntPipe) movieId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
  ): Promise<ReviewResponse> {
    return this.reviewsService.getReview(movieId, reviewId);
  }

  @Put(':reviewId')
  @ApiOperation({ summary: 'Update a review of a movie' })
  @ApiBody({ type: ReviewDto })
  @ApiOkResponse({ type: ReviewResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid review data', schema: { example: INVALID_REVIEW_EXAMPLE } })
  @ApiResponse({ status: 404, description: 'Review not found for this movie', schema: { example: REVIEW_NOT_FOUND_EXAMPLE } })
  update(
    @Param('movieId', ParseIntPipe) movieId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
    @Body() dto: ReviewDto,
  ): Promise<ReviewResponse> {
    return this.reviewsService.updateReview(reviewId, dto, movieId);
  }

  @Delete(':reviewId')
  @HttpCode(200)
  @ApiOperation({ summary: 'Delete a review of a movie' })
  @ApiResponse({ status: 200, description: 'Deleted', schema: { example: { ok: true } } })
  @ApiResponse({ status: 404, description: 'Review not found for this movie', schema: { example: REVIEW_NOT_FOUND_EXAMPLE } })
  async remove(
    @Param('movieId', ParseIntPipe) movieId: number,
    @Param('reviewId', ParseIntPipe) reviewId: number,
  ): Promise<{ ok: true }> {
    await this.reviewsService.deleteReview(reviewId, movieId);
    return { ok: true };
  }
}

@ApiTags('reviews')
@Controller('reviews')
export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  @Get()
  @ApiOperation({ summary: 'List all reviews (paged)' })
  list(@Query() query: PageQueryDto): Promise<Page<ReviewResponse>> {
    return this.reviewsService.listReviews(query.page, query.size);
  }

  @Get('search')
  @ApiOperation({
    summary: 'Search reviews',
    description:
      'Filters combine with AND. Sort fields: rating, createdAt, userName, id (default createdAt desc).',
  })
  @ApiResponse({ status: 400, description: 'Invalid search parameter' })
  search(@Query() query: SearchReviewsDto): Promise<Page<ReviewResponse>> {
    return this.reviewsService.searchReviews(query);
  }
}
