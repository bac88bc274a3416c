import { buildMovieSearchCriteria } from '../movie-search.criteria';
import { InvalidSearchParameterException } from '../../../common/exceptions/catalog.exceptions';

const YEAR = 2026;

function captureError(fn: () => unknown): InvalidSearchParameterException {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidSearchParameterException) return error;
    throw error;
  }
  throw new Error('expected InvalidSearchParameterException');
}

describe('buildMovieSearchCriteria', () => {
  it('returns an empty criteria object when nothing is given', () => {
    expect(buildMovieSearchCriteria({}, YEAR)).toEqual({});
  });

  it('trims text filters and keeps numeric ones', () => {
    expect(
      buildMovieSearchCriteria(
        {
          genre: ' Sci-Fi ',
          title: 'orbit ',
          director: ' lind',
          yearMin: 1990,
          yearMax: 2020,
          minRating: 8.5,
          maxRating: 10,
        },
        YEAR,
      ),
    ).toEqual({
      genre: 'Sci-Fi',
      title: 'orbit',
      director: 'lind',
      yearMin: 1990,
      yearMax: 2020,
      minRating: 8.5,
      maxRating: 10,
    });
  });

  it('rejects blank text filters', () => {
    const err = captureError(() => buildMovieSearchCriteria({ director: '   ' }, YEAR));
    expect(err.field).toBe('director');
    expect(err.reason).toBe('Director cannot be empty if provided');
  });

  it('rejects an inverted rating range', () => {
    const err = captureError(() =>
      buildMovieSearchCriteria({ minRating: 9, maxRating: 5 }, YEAR),
    );
    expect(err.field).toBe('minRating');
    expect(err.message).toBe(
      "Invalid value for field 'minRating': 9. Minimum rating cannot be greater than maximum rating (5)",
    );
  });

  it('accepts equal rating bounds', () => {
    expect(buildMovieSearchCriteria({ minRating: 7, maxRating: 7 }, YEAR)).toEqual({
      minRating: 7,
      maxRating: 7,
    });
  });

  it('rejects an inverted year range', () => {
    const err = captureError(() =>
      buildMovieSearchCriteria({ yearMin: 2010, yearMax: 2000 }, YEAR),
    );
    expect(err.field).toBe('yearMin');
    expect(err.reason).toBe('Minimum year cannot be greater than maximum year (2000)');
  });

  it('bounds years to [1900, current year + 5]', () => {
    expect(buildMovieSearchCriteria({ releaseYear: 1900 }, YEAR)).toEqual({ releaseYear: 1900 });
    expect(buildMovieSearchCriteria({ yearMax: 2031 }, YEAR)).toEqual({ yearMax: 2031 });
    expect(captureError(() => buildMovieSearchCriteria({ releaseYear: 1899 }, YEAR)).reason).toBe(
      'Year must be 1900 or later',
    );
    expect(captureError(() => buildMovieSearchCriteria({ yearMin: 2032 }, YEAR)).reason).toBe(
      'Year cannot be more than 5 years in the future (current year: 2026)',
    );
    expect(captureError(() => buildMovieSearchCriteria({ yearMin: 1999.5 }, YEAR)).reason).toBe(
      'Year must be a whole number',
    );
  });

  it('bounds ratings to [0, 10]', () => {
    expect(buildMovieSearchCriteria({ minRating: 0 }, YEAR)).toEqual({ minRating: 0 });
    expect(captureError(() => buildMovieSearchCriteria({ minRating: -0.1 }, YEAR)).reason).toBe(
      'Rating cannot be negative',
    );
    expect(captureError(() => buildMovieSearchCriteria({ maxRating: 10.5 }, YEAR)).reason).toBe(
      'Rating cannot exceed 10.0',
    );
    expect(
      captureError(() => buildMovieSearchCriteria({ maxRating: Number.NaN }, YEAR)).reason,
    ).toBe('Rating must be a number');
  });
});
