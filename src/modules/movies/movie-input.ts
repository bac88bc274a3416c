import { InvalidMovieDataException } from '../../common/exceptions/catalog.exceptions';

export const FIRST_RELEASE_YEAR = 1888; // first motion picture
export const RELEASE_YEAR_FUTURE_ALLOWANCE = 5;

export interface MovieInput {
  title?: string | null;
  director?: string | null;
  genre?: string | null;
  release_year?: number | null;
}

export interface MovieData {
  title: string;
  director: string;
  genre: string;
  release_year: number;
}

type TextField = 'title' | 'director' | 'genre';

function requireText(
  input: MovieInput,
  field: TextField,
  label: string,
  max: number,
): string {
  const value = input[field]?.trim() ?? '';
  if (value.length === 0) {
    throw new InvalidMovieDataException(
      field,
      input[field] ?? null,
      `${label} cannot be null or empty`,
    );
  }
  if (value.length > max) {
    throw new InvalidMovieDataException(
      field,
      value,
      `${label} cannot exceed ${max} characters`,
    );
  }
  return value;
}

export function validateMovieInput(
  input: MovieInput,
  currentYear: number = new Date().getFullYear(),
): MovieData {
  const title = requireText(input, 'title', 'Title', 255);
  const director = requireText(input, 'director', 'Director', 255);
  const genre = requireText(input, 'genre', 'Genre', 100);

  const year = input.release_year;
  if (year === undefined || year === null) {
    throw new InvalidMovieDataException('release_year', null, 'Release year cannot be null');
  }
  if (!Number.isInteger(year)) {
    throw new InvalidMovieDataException('release_year', year, 'Release year must be a whole number');
  }
  if (year < FIRST_RELEASE_YEAR) {
    throw new InvalidMovieDataException(
      'release_year',
      year,
      `Release year cannot be before ${FIRST_RELEASE_YEAR} (first motion picture)`,
    );
  }
  if (year > currentYear + RELEASE_YEAR_FUTURE_ALLOWANCE) {
    throw new InvalidMovieDataException(
      'release_year',
      year,
      `Release year cannot be more than ${RELEASE_YEAR_FUTURE_ALLOWANCE} years in the future (current year: ${currentYear})`,
    );
  }

  return { title, director, genre, release_year: year };
}
