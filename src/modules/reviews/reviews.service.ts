import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Movie } from '../../entities/movie.entity';
import { Review } from '../../entities/review.entity';
import {
  InvalidSearchParameterException,
  MovieNotFoundException,
  ReviewNotFoundException,
} from '../../common/exceptions/catalog.exceptions';
import {
  normalizePageRequest,
  parseSortSpec,
  toPage,
  type Page,
  type SortSpec,
} from '../../common/pagination/page';
import {
  LIKE_ESCAPE,
  containsPattern,
  supportsRowLocks,
} from '../../common/database/query-helpers';
import { computeAggregate } from './rating-calculator';
import {
  MAX_REVIEW_RATING,
  MIN_REVIEW_RATING,
  validateReviewInput,
  type ReviewInput,
} from './review-input';
import {
  REVIEW_SORT_FIELDS,
  type ReviewSortField,
  type SearchReviewsDto,
} from './dto/search-reviews.dto';

export interface ReviewResponse {
  id: number;
  movieId: number;
  user_name: string;
  review_text: string | null;
  rating: number;
  created_at: Date;
  updated_at: Date;
}

const REVIEW_SORT_COLUMNS: Record<ReviewSortField, string> = {
  rating: 'review.rating',
  createdAt: 'review.created_at',
  userName: 'review.user_name',
  id: 'review.id',
};

const DEFAULT_REVIEW_SORT: SortSpec<ReviewSortField> = {
  field: 'createdAt',
  direction: 'desc',
};

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(Movie)
    private readonly movieRepository: Repository<Movie>,
    @InjectRepository(Review)
    private readonly reviewRepository: Repository<Review>,
  ) {}

  async addReview(movieId: number, input: ReviewInput): Promise<ReviewResponse> {
    const { review, rating } = await this.dataSource.transaction(
      async (manager) => {
        const movie = await this.lockMovie(manager, movieId);
        if (!movie) throw new MovieNotFoundException(movieId);
        const data = validateReviewInput(input);
        const reviews = manager.getRepository(Review);
        const now = new Date();
        const saved = await reviews.save(
          reviews.create({
            movie_id: movieId,
            ...data,
            created_at: now,
            updated_at: now,
          }),
        );
        return {
          review: saved,
          rating: await this.refreshMovieRating(manager, movieId),
        };
      },
    );
    this.logger.log(
      `Review ${review.id} added to movie ${movieId} (rating ${rating ?? 'none'})`,
    );
    return this.toResponse(review);
  }

  /**
   * Overwrites the user-mutable fields of a review. When `movieId` is given the
   * review must belong to that movie.
   */
  async updateReview(
    reviewId: number,
    input: ReviewInput,
    movieId?: number,
  ): Promise<ReviewResponse> {
    const review = await this.dataSource.transaction(async (manager) => {
      const reviews = manager.getRepository(Review);
      const existing = await reviews.findOne({ where: { id: reviewId } });
      if (!existing || (movieId !== undefined && existing.movie_id !== movieId)) {
        throw new ReviewNotFoundException(reviewId, movieId);
      }
      const data = validateReviewInput(input);
      await this.lockMovie(manager, existing.movie_id);
      const current = await this.lockReview(manager, reviewId);
      if (!current) throw new ReviewNotFoundException(reviewId, movieId);
      current.user_name = data.user_name;
      current.review_text = data.review_text;
      current.rating = data.rating;
      current.updated_at = new Date();
      const saved = await reviews.save(current);
      await this.refreshMovieRating(manager, current.movie_id);
      return saved;
    });
    this.logger.log(`Review ${reviewId} of movie ${review.movie_id} updated`);
    return this.toResponse(review);
  }

  async deleteReview(reviewId: number, movieId?: number): Promise<void> {
    const ownerId = await this.dataSource.transaction(async (manager) => {
      const reviews = manager.getRepository(Review);
      const existing = await reviews.findOne({ where: { id: reviewId } });
      if (!existing || (movieId !== undefined && existing.movie_id !== movieId)) {
        throw new ReviewNotFoundException(reviewId, movieId);
      }
      const owner = existing.movie_id;
      await this.lockMovie(manager, owner);
      const current = await this.lockReview(manager, reviewId);
      if (!current) throw new ReviewNotFoundException(reviewId, movieId);
      await reviews.remove(current);
      await this.refreshMovieRating(manager, owner);
      return owner;
    });
    this.logger.log(`Review ${reviewId} removed from movie ${ownerId}`);
  }

  async getReviewsForMovie(movieId: number): Promise<ReviewResponse[]> {
    await this.assertMovieExists(movieId);
    const reviews = await this.reviewRepository.find({
      where: { movie_id: movieId },
      order: { id: 'ASC' },
    });
    return reviews.map((r) => this.toResponse(r));
  }

  /** Review lookup is always scoped by its claimed parent movie. */
  async getReview(movieId: number, reviewId: number): Promise<ReviewResponse> {
    await this.assertMovieExists(movieId);
    const review = await this.reviewRepository.findOne({
      where: { id: reviewId, movie_id: movieId },
    });
    if (!review) {
      this.logger.warn(`Review ${reviewId} not found for movie ${movieId}`);
      throw new ReviewNotFoundException(reviewId, movieId);
    }
    return this.toResponse(review);
  }

  async listReviews(page?: number, size?: number): Promise<Page<ReviewResponse>> {
    const request = normalizePageRequest(page, size);
    const [items, total] = await this.reviewRepository.findAndCount({
      order: { id: 'ASC' },
      skip: request.offset,
      take: request.size,
    });
    return toPage(
      items.map((r) => this.toResponse(r)),
      total,
      request,
    );
  }

  async searchReviews(params: SearchReviewsDto): Promise<Page<ReviewResponse>> {
    const minRating = checkReviewScoreBound('minRating', params.minRating);
    const maxRating = checkReviewScoreBound('maxRating', params.maxRating);
    if (minRating !== undefined && maxRating !== undefined && minRating > maxRating) {
      throw new InvalidSearchParameterException(
        'minRating',
        minRating,
        'Minimum rating cannot be greater than maximum rating',
      );
    }
    const startDate = parseTimestamp('startDate', params.startDate);
    const endDate = parseTimestamp('endDate', params.endDate);
    if (startDate && endDate && startDate.getTime() > endDate.getTime()) {
      throw new InvalidSearchParameterException(
        'startDate',
        params.startDate,
        'Start date cannot be after end date',
      );
    }
    let userName: string | undefined;
    if (params.userName !== undefined) {
      userName = params.userName.trim();
      if (userName.length === 0) {
        throw new InvalidSearchParameterException(
          'userName',
          params.userName,
          'User name cannot be empty if provided',
        );
      }
    }
    const sort = parseSortSpec(
      REVIEW_SORT_FIELDS,
      params.sortBy,
      params.sortOrder,
      DEFAULT_REVIEW_SORT,
    );
    const request = normalizePageRequest(params.page, params.size);

    const qb = this.reviewRepository.createQueryBuilder('review');
    if (minRating !== undefined) {
      qb.andWhere('review.rating >= :minRating', { minRating });
    }
    if (maxRating !== undefined) {
      qb.andWhere('review.rating <= :maxRating', { maxRating });
    }
    if (userName !== undefined) {
      qb.andWhere(`LOWER(review.user_name) LIKE :userName ${LIKE_ESCAPE}`, {
        userName: containsPattern(userName),
      });
    }
    if (startDate) {
      qb.andWhere('review.created_at >= :startDate', { startDate });
    }
    if (endDate) {
      qb.andWhere('review.created_at <= :endDate', { endDate });
    }
    const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
    qb.orderBy(REVIEW_SORT_COLUMNS[sort.field], direction);
    if (sort.field !== 'id') qb.addOrderBy('review.id', 'ASC');

    const [items, total] = await qb
      .skip(request.offset)
      .take(request.size)
      .getManyAndCount();
    return toPage(
      items.map((r) => this.toResponse(r)),
      total,
      request,
      sort,
    );
  }

  private async assertMovieExists(movieId: number): Promise<void> {
    const exists = await this.movieRepository.exists({ where: { id: movieId } });
    if (!exists) {
      this.logger.warn(`Movie ${movieId} not found`);
      throw new MovieNotFoundException(movieId);
    }
  }

  // Serialises concurrent review writers on the same movie where the driver allows it.
  private lockMovie(manager: EntityManager, movieId: number): Promise<Movie | null> {
    return manager.getRepository(Movie).findOne({
      where: { id: movieId },
      ...(supportsRowLocks(manager)
        ? { lock: { mode: 'pessimistic_write' as const } }
        : {}),
    });
  }

  // A review removed while the movie lock was awaited must not be written back.
  private lockReview(manager: EntityManager, reviewId: number): Promise<Review | null> {
    return manager.getRepository(Review).findOne({
      where: { id: reviewId },
      ...(supportsRowLocks(manager)
        ? { lock: { mode: 'pessimistic_write' as const } }
        : {}),
    });
  }

  /**
   * Re-reads the movie's current review set inside the caller's transaction and
   * persists the new aggregate. Never reuses a rating computed elsewhere.
   */
  private async refreshMovieRating(
    manager: EntityManager,
    movieId: number,
  ): Promise<number | null> {
    const current = await manager.getRepository(Review).find({
      select: { id: true, rating: true },
      where: { movie_id: movieId },
    });
    const rating = computeAggregate(current.map((r) => r.rating));
    await manager.getRepository(Movie).update({ id: movieId }, { rating });
    return rating;
  }

  private toResponse(r: Review): ReviewResponse {
    return {
      id: r.id,
      movieId: r.movie_id,
      user_name: r.user_name,
      review_text: r.review_text,
      rating: r.rating,
      created_at: r.created_at,
      updated_at: r.updated_at,
    };
  }
}

function checkReviewScoreBound(
  field: 'minRating' | 'maxRating',
  value: number | undefined,
): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isFinite(value) || value < MIN_REVIEW_RATING || value > MAX_REVIEW_RATING) {
    throw new InvalidSearchParameterException(
      field,
      value,
      'Review rating bounds must be between 1.0 and 10.0',
    );
  }
  return value;
}

function parseTimestamp(
  field: 'startDate' | 'endDate',
  raw: string | undefined,
): Date | undefined {
  if (raw === undefined) return undefined;
  const parsed = new Date(raw.trim());
  if (raw.trim().length === 0 || Number.isNaN(parsed.getTime())) {
    throw new InvalidSearchParameterException(
      field,
      raw,
      'Expected an ISO-8601 timestamp',
    );
  }
  return parsed;
}
