import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import type { Movie } from '../../entities/movie.entity';
import { LIKE_ESCAPE, containsPattern } from '../../common/database/query-helpers';
import { parseSortSpec, type SortSpec } from '../../common/pagination/page';
import type { MovieSearchCriteria } from './movie-search.criteria';

export const MOVIE_ALIAS = 'movie';

export const MOVIE_SORT_FIELDS = [
  'title',
  'director',
  'genre',
  'releaseYear',
  'rating',
  'id',
] as const;
export type MovieSortField = (typeof MOVIE_SORT_FIELDS)[number];

export const DEFAULT_MOVIE_SORT: SortSpec<MovieSortField> = {
  field: 'id',
  direction: 'asc',
};

const SORT_COLUMNS: Record<MovieSortField, string> = {
  title: `${MOVIE_ALIAS}.title`,
  director: `${MOVIE_ALIAS}.director`,
  genre: `${MOVIE_ALIAS}.genre`,
  releaseYear: `${MOVIE_ALIAS}.release_year`,
  rating: `${MOVIE_ALIAS}.rating`,
  id: `${MOVIE_ALIAS}.id`,
};

/** One filter condition; parameter names are unique per criterion. */
export interface MoviePredicate {
  field: keyof MovieSearchCriteria;
  clause: string;
  params: ObjectLiteral;
}

type PredicateFactory = (criteria: MovieSearchCriteria) => MoviePredicate | null;

// One factory per criterion; each yields null when its criterion is absent.
const PREDICATE_FACTORIES: readonly PredicateFactory[] = [
  ({ genre }) =>
    genre === undefined
      ? null
      : {
          field: 'genre',
          clause: `LOWER(${MOVIE_ALIAS}.genre) = :genre`,
          params: { genre: genre.toLowerCase() },
        },
  ({ title }) =>
    title === undefined
      ? null
      : {
          field: 'title',
          clause: `LOWER(${MOVIE_ALIAS}.title) LIKE :title ${LIKE_ESCAPE}`,
          params: { title: containsPattern(title) },
        },
  ({ director }) =>
    director === undefined
      ? null
      : {
          field: 'director',
          clause: `LOWER(${MOVIE_ALIAS}.director) LIKE :director ${LIKE_ESCAPE}`,
          params: { director: containsPattern(director) },
        },
  ({ releaseYear }) =>
    releaseYear === undefined
      ? null
      : {
          field: 'releaseYear',
          clause: `${MOVIE_ALIAS}.release_year = :releaseYear`,
          params: { releaseYear },
        },
  ({ yearMin }) =>
    yearMin === undefined
      ? null
      : {
          field: 'yearMin',
          clause: `${MOVIE_ALIAS}.release_year >= :yearMin`,
          params: { yearMin },
        },
  ({ yearMax }) =>
    yearMax === undefined
      ? null
      : {
          field: 'yearMax',
          clause: `${MOVIE_ALIAS}.release_year <= :yearMax`,
          params: { yearMax },
        },
  ({ minRating }) =>
    minRating === undefined
      ? null
      : {
          field: 'minRating',
          clause: `${MOVIE_ALIAS}.rating >= :minRating`,
          params: { minRating },
        },
  ({ maxRating }) =>
    maxRating === undefined
      ? null
      : {
          field: 'maxRating',
          clause: `${MOVIE_ALIAS}.rating <= :maxRating`,
          params: { maxRating },
        },
];

export function buildMoviePredicates(criteria: MovieSearchCriteria): MoviePredicate[] {
  return PREDICATE_FACTORIES.map((factory) => factory(criteria)).filter(
    (p): p is MoviePredicate => p !== null,
  );
}

export function parseMovieSort(
  sortBy: string | undefined,
  sortOrder: string | undefined,
): SortSpec<MovieSortField> {
  return parseSortSpec(MOVIE_SORT_FIELDS, sortBy, sortOrder, DEFAULT_MOVIE_SORT);
}

/**
 * Folds the criteria into `qb` with AND and applies the ordering. Unrated
 * movies sort after rated ones; id breaks ties.
 */
export function applyMovieQuery(
  qb: SelectQueryBuilder<Movie>,
  criteria: MovieSearchCriteria,
  sort: SortSpec<MovieSortField>,
): SelectQueryBuilder<Movie> {
  for (const predicate of buildMoviePredicates(criteria)) {
    qb.andWhere(predicate.clause, predicate.params);
  }
  const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
  if (sort.field === 'rating') {
    qb.orderBy(SORT_COLUMNS.rating, direction, 'NULLS LAST');
  } else {
    qb.orderBy(SORT_COLUMNS[sort.field], direction);
  }
  if (sort.field !== 'id') qb.addOrderBy(SORT_COLUMNS.id, 'ASC');
  return qb;
}
