import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Movie } from '../entities/movie.entity';
import { Review } from '../entities/review.entity';
import { computeAggregate } from '../modules/reviews/rating-calculator';
import { readFlag } from './database.config';
import seedData from './seed/movies.json';

export interface SeedReview {
  user_name: string;
  review_text?: string | null;
  rating: number;
}

export interface SeedMovie {
  title: string;
  director: string;
  genre: string;
  release_year: number;
  reviews: SeedReview[];
}

@Injectable()
export class DatabaseInitService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseInitService.name);

  constructor(
    @InjectDataSource()
    private dataSource: DataSource,
    private configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    const nodeEnv = this.configService.get<string>('NODE_ENV');

    if (nodeEnv === 'test') {
      this.logger.log('Skipping database initialization in test environment');
      return;
    }

    await this.initializeDatabase();
  }

  private async initializeDatabase(): Promise<void> {
    try {
      this.logger.log('Initializing database connection...');

      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
        this.logger.log('Database connection initialized successfully');
      }

      await this.dataSource.runMigrations();
      this.logger.log('Database migrations completed');

      if (readFlag(this.configService, 'SEED_ENABLED', true)) {
        await this.seedInitialData();
      }
    } catch (error) {
      this.logger.error('Failed to initialize database:', error);
      throw error;
    }
  }

  /**
   * Loads the sample catalog into an empty database. Each movie's rating is
   * computed from its seeded reviews. Failures are logged and swallowed so a
   * bad seed never blocks startup.
   */
  async seedInitialData(movies: readonly SeedMovie[] = seedData): Promise<number> {
    try {
      const existing = await this.dataSource.getRepository(Movie).count();
      if (existing > 0) {
        this.logger.log(`Catalog already holds ${existing} movies, skipping seed`);
        return 0;
      }

      await this.dataSource.transaction(async (manager) => {
        const movieRepo = manager.getRepository(Movie);
        const reviewRepo = manager.getRepository(Review);
        for (const entry of movies) {
          const movie = await movieRepo.save(
            movieRepo.create({
              title: entry.title,
              director: entry.director,
              genre: entry.genre,
              release_year: entry.release_year,
              rating: computeAggregate(entry.reviews.map((r) => r.rating)),
            }),
          );
          const now = new Date();
          await reviewRepo.save(
            entry.reviews.map((r) =>
              reviewRepo.create({
                movie_id: movie.id,
                user_name: r.user_name,
                review_text: r.review_text ?? null,
                rating: r.rating,
                created_at: now,
                updated_at: now,
              }),
            ),
          );
        }
      });

      this.logger.log(`Seeded ${movies.length} sample movies`);
      return movies.length;
    } catch (error) {
      this.logger.error('Failed to seed initial data:', error);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Database health check failed:', error);
      return false;
    }
  }
}
