import { InvalidSearchParameterException } from '../../common/exceptions/catalog.exceptions';

export const MIN_SEARCH_YEAR = 1900;
export const FUTURE_YEAR_ALLOWANCE = 5;
export const MIN_SEARCH_RATING = 0;
export const MAX_SEARCH_RATING = 10;

/** Raw, optional filter values as they come from the transport. */
export interface MovieSearchParams {
  genre?: string;
  title?: string;
  director?: string;
  releaseYear?: number;
  yearMin?: number;
  yearMax?: number;
  minRating?: number;
  maxRating?: number;
}

/**
 * Validated catalog filters. Every field is optional; present fields are
 * combined with AND.
 */
export interface MovieSearchCriteria {
  /** exact, case-insensitive */
  genre?: string;
  /** substring, case-insensitive */
  title?: string;
  /** substring, case-insensitive */
  director?: string;
  releaseYear?: number;
  yearMin?: number;
  yearMax?: number;
  minRating?: number;
  maxRating?: number;
}

type TextField = 'genre' | 'title' | 'director';
type YearField = 'releaseYear' | 'yearMin' | 'yearMax';
type RatingField = 'minRating' | 'maxRating';

const TEXT_FIELDS: readonly TextField[] = ['genre', 'title', 'director'];
const YEAR_FIELDS: readonly YearField[] = ['releaseYear', 'yearMin', 'yearMax'];
const RATING_FIELDS: readonly RatingField[] = ['minRating', 'maxRating'];

export function buildMovieSearchCriteria(
  params: MovieSearchParams,
  currentYear: number = new Date().getFullYear(),
): MovieSearchCriteria {
  const criteria: MovieSearchCriteria = {};

  for (const field of TEXT_FIELDS) {
    const raw = params[field];
    if (raw === undefined) continue;
    const value = raw.trim();
    if (value.length === 0) {
      throw new InvalidSearchParameterException(
        field,
        raw,
        `${capitalize(field)} cannot be empty if provided`,
      );
    }
    criteria[field] = value;
  }

  const maxYear = currentYear + FUTURE_YEAR_ALLOWANCE;
  for (const field of YEAR_FIELDS) {
    const value = params[field];
    if (value === undefined) continue;
    if (!Number.isInteger(value)) {
      throw new InvalidSearchParameterException(field, value, 'Year must be a whole number');
    }
    if (value < MIN_SEARCH_YEAR) {
      throw new InvalidSearchParameterException(
        field,
        value,
        `Year must be ${MIN_SEARCH_YEAR} or later`,
      );
    }
    if (value > maxYear) {
      throw new InvalidSearchParameterException(
        field,
        value,
        `Year cannot be more than ${FUTURE_YEAR_ALLOWANCE} years in the future (current year: ${currentYear})`,
      );
    }
    criteria[field] = value;
  }

  for (const field of RATING_FIELDS) {
    const value = params[field];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      throw new InvalidSearchParameterException(field, value, 'Rating must be a number');
    }
    if (value < MIN_SEARCH_RATING) {
      throw new InvalidSearchParameterException(field, value, 'Rating cannot be negative');
    }
    if (value > MAX_SEARCH_RATING) {
      throw new InvalidSearchParameterException(field, value, 'Rating cannot exceed 10.0');
    }
    criteria[field] = value;
  }

  if (
    criteria.minRating !== undefined &&
    criteria.maxRating !== undefined &&
    criteria.minRating > criteria.maxRating
  ) {
    throw new InvalidSearchParameterException(
      'minRating',
      criteria.minRating,
      `Minimum rating cannot be greater than maximum rating (${criteria.maxRating})`,
    );
  }
  if (
    criteria.yearMin !== undefined &&
    criteria.yearMax !== undefined &&
    criteria.yearMin > criteria.yearMax
  ) {
    throw new InvalidSearchParameterException(
      'yearMin',
      criteria.yearMin,
      `Minimum year cannot be greater than maximum year (${criteria.yearMax})`,
    );
  }

  return criteria;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
