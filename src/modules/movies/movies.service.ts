import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { Movie } from '../../entities/movie.entity';
import {
  DuplicateMovieException,
  MovieNotFoundException,
} from '../../common/exceptions/catalog.exceptions';
import { normalizePageRequest, toPage, type Page } from '../../common/pagination/page';
import { validateMovieInput, type MovieData, type MovieInput } from './movie-input';
import { buildMovieSearchCriteria } from './movie-search.criteria';
import { MOVIE_ALIAS, applyMovieQuery, parseMovieSort } from './movie-query.builder';
import type { SearchMoviesDto } from './dto/search-movies.dto';

export const DEFAULT_TOP_RATED_LIMIT = 10;
export const MAX_TOP_RATED_LIMIT = 50;

@Injectable()
export class MoviesService {
  private readonly logger = new Logger(MoviesService.name);

  constructor(
    @InjectRepository(Movie)
    private readonly movieRepository: Repository<Movie>,
  ) {}

  async create(input: MovieInput): Promise<Movie> {
    const data = validateMovieInput(input);
    await this.assertUnique(data);
    const movie = await this.movieRepository.save(
      this.movieRepository.create({ ...data, rating: null }),
    );
    this.logger.log(`Movie ${movie.id} created: ${movie.title}`);
    return movie;
  }

  findAll(): Promise<Movie[]> {
    return this.movieRepository.find({ order: { id: 'ASC' } });
  }

  async findOne(id: number): Promise<Movie> {
    const movie = await this.movieRepository.findOne({ where: { id } });
    if (!movie) {
      this.logger.warn(`Movie ${id} not found`);
      throw new MovieNotFoundException(id);
    }
    return movie;
  }

  /** Partial update; omitted fields keep their stored values. */
  async update(id: number, input: MovieInput): Promise<Movie> {
    const movie = await this.findOne(id);
    const data = validateMovieInput({
      title: input.title ?? movie.title,
      director: input.director ?? movie.director,
      genre: input.genre ?? movie.genre,
      release_year: input.release_year ?? movie.release_year,
    });
    await this.assertUnique(data, id);
    // rating belongs to the review transactions; write only client fields
    await this.movieRepository.update({ id }, data);
    this.logger.log(`Movie ${id} updated`);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const movie = await this.findOne(id);
    await this.movieRepository.remove(movie);
    this.logger.log(`Movie ${id} removed`);
  }

  async search(params: SearchMoviesDto): Promise<Page<Movie>> {
    const criteria = buildMovieSearchCriteria(params);
    const sort = parseMovieSort(params.sortBy, params.sortOrder);
    const request = normalizePageRequest(params.page, params.size);
    this.logger.debug(
      `Searching movies with ${JSON.stringify(criteria)} sorted by ${sort.field} ${sort.direction}`,
    );

    const qb = applyMovieQuery(
      this.movieRepository.createQueryBuilder(MOVIE_ALIAS),
      criteria,
      sort,
    );
    const [items, total] = await qb
      .skip(request.offset)
      .take(request.size)
      .getManyAndCount();
    return toPage(items, total, request, sort);
  }

  topRated(limit?: number): Promise<Movie[]> {
    const take =
      limit === undefined || !Number.isFinite(limit)
        ? DEFAULT_TOP_RATED_LIMIT
        : Math.min(MAX_TOP_RATED_LIMIT, Math.max(1, Math.trunc(limit)));
    return this.movieRepository.find({
      where: { rating: Not(IsNull()) },
      order: { rating: 'DESC', id: 'ASC' },
      take,
    });
  }

  private async assertUnique(data: MovieData, excludeId?: number): Promise<void> {
    const qb = this.movieRepository
      .createQueryBuilder(MOVIE_ALIAS)
      .where(`LOWER(${MOVIE_ALIAS}.title) = :title`, { title: data.title.toLowerCase() })
      .andWhere(`LOWER(${MOVIE_ALIAS}.director) = :director`, {
        director: data.director.toLowerCase(),
      });
    if (excludeId !== undefined) {
      qb.andWhere(`${MOVIE_ALIAS}.id != :excludeId`, { excludeId });
    }
    if (await qb.getExists()) {
      throw new DuplicateMovieException(data.title, data.director);
    }
  }
}
