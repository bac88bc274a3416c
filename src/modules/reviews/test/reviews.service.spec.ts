import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ReviewsService } from '../reviews.service';
import { Movie } from '../../../entities/movie.entity';
import { Review } from '../../../entities/review.entity';
import {
  InvalidReviewDataException,
  InvalidSearchParameterException,
  MovieNotFoundException,
  ReviewNotFoundException,
} from '../../../common/exceptions/catalog.exceptions';
import { createQueryBuilderMock, createRepoMock } from '../../../../test/repo-mocks';

function makeMovie(overrides: Partial<Movie> = {}): Movie {
  return Object.assign(new Movie(), {
    id: 2,
    title: 'The Quiet Orbit',
    director: 'Mara Lindqvist',
    genre: 'Sci-Fi',
    release_year: 2014,
    rating: null,
    ...overrides,
  });
}

function makeReview(overrides: Partial<Review> = {}): Review {
  const at = new Date('2026-03-01T10:00:00Z');
  return Object.assign(new Review(), {
    id: 5,
    movie_id: 2,
    user_name: 'critic',
    review_text: null,
    rating: 8,
    created_at: at,
    updated_at: at,
    ...overrides,
  });
}

describe('ReviewsService', () => {
  let service: ReviewsService;

  // repositories used outside transactions
  const movieRepository = createRepoMock<Movie>();
  const reviewRepository = createRepoMock<Review>();
  // repositories handed out by the transaction manager
  const txMovies = createRepoMock<Movie>();
  const txReviews = createRepoMock<Review>();

  const manager = {
    connection: { options: { type: 'postgres' } },
    getRepository: jest.fn((target: unknown) => (target === Movie ? txMovies : txReviews)),
  };
  const dataSource = {
    transaction: jest.fn(async (work: (m: typeof manager) => Promise<unknown>) => work(manager)),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReviewsService,
        { provide: DataSource, useValue: dataSource },
        { provide: getRepositoryToken(Movie), useValue: movieRepository },
        { provide: getRepositoryToken(Review), useValue: reviewRepository },
      ],
    }).compile();

    service = module.get<ReviewsService>(ReviewsService);

    txReviews.create.mockImplementation((data?: Partial<Review>) =>
      Object.assign(new Review(), data),
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('addReview', () => {
    it('saves the review and recomputes the rating in one transaction', async () => {
      txMovies.findOne.mockResolvedValue(makeMovie());
      txReviews.save.mockImplementation(async (review: Review) => Object.assign(review, { id: 4 }));
      txReviews.find.mockResolvedValue([
        makeReview({ id: 1, rating: 8 }),
        makeReview({ id: 4, rating: 9 }),
      ]);

      const result = await service.addReview(2, {
        user_name: ' critic ',
        review_text: 'Sharp',
        rating: 9,
      });

      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
      expect(txMovies.findOne).toHaveBeenCalledWith({
        where: { id: 2 },
        lock: { mode: 'pessimistic_write' },
      });
      expect(txReviews.find).toHaveBeenCalledWith({
        select: { id: true, rating: true },
        where: { movie_id: 2 },
      });
      expect(txMovies.update).toHaveBeenCalledWith({ id: 2 }, { rating: 8.5 });
      expect(result).toEqual(
        expect.objectContaining({
          id: 4,
          movieId: 2,
          user_name: 'critic',
          review_text: 'Sharp',
          rating: 9,
        }),
      );
    });

    it('fails with MovieNotFound before touching reviews', async () => {
      txMovies.findOne.mockResolvedValue(null);

      await expect(service.addReview(99, { user_name: 'a', rating: 5 })).rejects.toBeInstanceOf(
        MovieNotFoundException,
      );
      expect(txReviews.save).not.toHaveBeenCalled();
      expect(txMovies.update).not.toHaveBeenCalled();
    });

    it('rejects invalid data without writing', async () => {
      txMovies.findOne.mockResolvedValue(makeMovie());

      await expect(service.addReview(2, { user_name: 'a', rating: 11 })).rejects.toBeInstanceOf(
        InvalidReviewDataException,
      );
      expect(txReviews.save).not.toHaveBeenCalled();
    });

    it('does not request a row lock on SQLite', async () => {
      manager.connection.options.type = 'better-sqlite3';
      txMovies.findOne.mockResolvedValue(null);

      await expect(service.addReview(2, { user_name: 'a', rating: 5 })).rejects.toBeInstanceOf(
        MovieNotFoundException,
      );
      expect(txMovies.findOne).toHaveBeenCalledWith({ where: { id: 2 } });
      manager.connection.options.type = 'postgres';
    });
  });

  describe('updateReview', () => {
    it('overwrites the fields and refreshes the rating', async () => {
      txReviews.findOne.mockResolvedValue(makeReview({ rating: 6 }));
      txMovies.findOne.mockResolvedValue(makeMovie());
      txReviews.save.mockImplementation(async (review: Review) => review);
      txReviews.find.mockResolvedValue([makeReview({ rating: 7 }), makeReview({ id: 6, rating: 8 })]);

      const result = await service.updateReview(5, { user_name: 'critic', rating: 7 }, 2);

      expect(result.rating).toBe(7);
      expect(result.review_text).toBeNull();
      expect(txMovies.update).toHaveBeenCalledWith({ id: 2 }, { rating: 7.5 });
    });

    it('treats a review of another movie as not found', async () => {
      txReviews.findOne.mockResolvedValue(makeReview({ movie_id: 3 }));

      await expect(
        service.updateReview(5, { user_name: 'a', rating: 5 }, 2),
      ).rejects.toThrow('Review with ID 5 not found for movie with ID 2');
      expect(txReviews.save).not.toHaveBeenCalled();
    });

    it('does not write back a review deleted while the movie lock was awaited', async () => {
      txReviews.findOne.mockResolvedValueOnce(makeReview()).mockResolvedValueOnce(null);
      txMovies.findOne.mockResolvedValue(makeMovie());

      await expect(
        service.updateReview(5, { user_name: 'critic', rating: 7 }, 2),
      ).rejects.toThrow('Review with ID 5 not found for movie with ID 2');
      expect(txReviews.findOne).toHaveBeenNthCalledWith(2, {
        where: { id: 5 },
        lock: { mode: 'pessimistic_write' },
      });
      expect(txReviews.save).not.toHaveBeenCalled();
      expect(txMovies.update).not.toHaveBeenCalled();
    });

    it('reports a missing review without a movie scope', async () => {
      txReviews.findOne.mockResolvedValue(null);

      await expect(service.updateReview(5, { user_name: 'a', rating: 5 })).rejects.toThrow(
        'Review with ID 5 not found',
      );
    });
  });

  describe('deleteReview', () => {
    it('clears the rating when the last review goes', async () => {
      const review = makeReview();
      txReviews.findOne.mockResolvedValue(review);
      txMovies.findOne.mockResolvedValue(makeMovie({ rating: 8 }));
      txReviews.remove.mockResolvedValue(review);
      txReviews.find.mockResolvedValue([]);

      await service.deleteReview(5, 2);

      expect(txReviews.remove).toHaveBeenCalledWith(review);
      expect(txMovies.update).toHaveBeenCalledWith({ id: 2 }, { rating: null });
    });

    it('fails with ReviewNotFound when the review is gone once the movie is locked', async () => {
      txReviews.findOne.mockResolvedValueOnce(makeReview()).mockResolvedValueOnce(null);
      txMovies.findOne.mockResolvedValue(makeMovie({ rating: 8 }));

      await expect(service.deleteReview(5, 2)).rejects.toBeInstanceOf(ReviewNotFoundException);
      expect(txReviews.findOne).toHaveBeenNthCalledWith(2, {
        where: { id: 5 },
        lock: { mode: 'pessimistic_write' },
      });
      expect(txReviews.remove).not.toHaveBeenCalled();
      expect(txMovies.update).not.toHaveBeenCalled();
    });

    it('propagates a failed rating write', async () => {
      const review = makeReview();
      txReviews.findOne.mockResolvedValue(review);
      txMovies.findOne.mockResolvedValue(makeMovie());
      txReviews.remove.mockResolvedValue(review);
      txReviews.find.mockResolvedValue([]);
      txMovies.update.mockRejectedValueOnce(new Error('write failed'));

      await expect(service.deleteReview(5)).rejects.toThrow('write failed');
    });
  });

  describe('reads', () => {
    it('lists a movie\'s reviews in id order', async () => {
      movieRepository.exists.mockResolvedValue(true);
      reviewRepository.find.mockResolvedValue([makeReview({ id: 1 }), makeReview({ id: 2 })]);

      const result = await service.getReviewsForMovie(2);

      expect(reviewRepository.find).toHaveBeenCalledWith({
        where: { movie_id: 2 },
        order: { id: 'ASC' },
      });
      expect(result.map((r) => r.id)).toEqual([1, 2]);
    });

    it('fails for an unknown movie', async () => {
      movieRepository.exists.mockResolvedValue(false);

      await expect(service.getReviewsForMovie(42)).rejects.toThrow('Movie with ID 42 not found');
    });

    it('scopes a single review lookup by movie', async () => {
      movieRepository.exists.mockResolvedValue(true);
      reviewRepository.findOne.mockResolvedValue(null);

      await expect(service.getReview(2, 5)).rejects.toBeInstanceOf(ReviewNotFoundException);
      expect(reviewRepository.findOne).toHaveBeenCalledWith({
        where: { id: 5, movie_id: 2 },
      });
    });

    it('pages all reviews', async () => {
      reviewRepository.findAndCount.mockResolvedValue([[makeReview()], 21]);

      const page = await service.listReviews(1, 20);

      expect(reviewRepository.findAndCount).toHaveBeenCalledWith({
        order: { id: 'ASC' },
        skip: 20,
        take: 20,
      });
      expect(page.totalPages).toBe(2);
      expect(page.last).toBe(true);
      expect(page.content[0].movieId).toBe(2);
    });
  });

  describe('searchReviews', () => {
    it('applies filters and the default newest-first order', async () => {
      const qb = createQueryBuilderMock<Review>();
      qb.getManyAndCount.mockResolvedValue([[makeReview()], 1]);
      reviewRepository.createQueryBuilder.mockReturnValue(qb);

      const page = await service.searchReviews({
        minRating: 7,
        userName: ' Crit ',
        startDate: '2026-01-01T00:00:00Z',
      });

      expect(reviewRepository.createQueryBuilder).toHaveBeenCalledWith('review');
      expect(qb.andWhere).toHaveBeenCalledWith('review.rating >= :minRating', { minRating: 7 });
      expect(qb.andWhere).toHaveBeenCalledWith(
        "LOWER(review.user_name) LIKE :userName ESCAPE '\\'",
        { userName: '%crit%' },
      );
      expect(qb.andWhere).toHaveBeenCalledWith('review.created_at >= :startDate', {
        startDate: new Date('2026-01-01T00:00:00Z'),
      });
      expect(qb.orderBy).toHaveBeenCalledWith('review.created_at', 'DESC');
      expect(qb.addOrderBy).toHaveBeenCalledWith('review.id', 'ASC');
      expect(qb.skip).toHaveBeenCalledWith(0);
      expect(qb.take).toHaveBeenCalledWith(20);
      expect(page.sort).toEqual({ field: 'createdAt', direction: 'desc' });
      expect(page.totalElements).toBe(1);
    });

    it('rejects score bounds outside [1, 10]', async () => {
      await expect(service.searchReviews({ minRating: 0.5 })).rejects.toThrow(
        'Review rating bounds must be between 1.0 and 10.0',
      );
    });

    it('rejects an inverted score range', async () => {
      await expect(service.searchReviews({ minRating: 9, maxRating: 5 })).rejects.toBeInstanceOf(
        InvalidSearchParameterException,
      );
    });

    it('rejects unparsable and inverted dates', async () => {
      await expect(service.searchReviews({ endDate: 'yesterday' })).rejects.toThrow(
        "Invalid value for field 'endDate': yesterday. Expected an ISO-8601 timestamp",
      );
      await expect(
        service.searchReviews({
          startDate: '2026-02-01T00:00:00Z',
          endDate: '2026-01-01T00:00:00Z',
        }),
      ).rejects.toThrow('Start date cannot be after end date');
    });

    it('rejects a blank user name filter', async () => {
      await expect(service.searchReviews({ userName: '  ' })).rejects.toThrow(
        'User name cannot be empty if provided',
      );
      expect(reviewRepository.createQueryBuilder).not.toHaveBeenCalled();
    });
  });
});
