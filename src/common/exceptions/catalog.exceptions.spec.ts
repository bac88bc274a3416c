import {
  DuplicateMovieException,
  InvalidSearchParameterException,
  MovieNotFoundException,
  ReviewNotFoundException,
  describeInvalidValue,
} from './catalog.exceptions';

describe('catalog exceptions', () => {
  it('echoes numbers and short strings in validation messages', () => {
    expect(describeInvalidValue('minRating', 9, 'Too high')).toBe(
      "Invalid value for field 'minRating': 9. Too high",
    );
    expect(describeInvalidValue('genre', 'Noir', 'Bad')).toBe(
      "Invalid value for field 'genre': Noir. Bad",
    );
  });

  it('omits long strings and other values', () => {
    expect(describeInvalidValue('title', 'x'.repeat(101), 'Too long')).toBe(
      "Invalid value for field 'title'. Too long",
    );
    expect(describeInvalidValue('rating', null, 'Missing')).toBe(
      "Invalid value for field 'rating'. Missing",
    );
  });

  it('renders not-found bodies', () => {
    expect(new MovieNotFoundException(7).getResponse()).toEqual({
      statusCode: 404,
      error: 'Movie Not Found',
      message: 'Movie with ID 7 not found',
    });
    expect(new ReviewNotFoundException(3).message).toBe('Review with ID 3 not found');
    expect(new ReviewNotFoundException(3, 9).message).toBe(
      'Review with ID 3 not found for movie with ID 9',
    );
  });

  it('carries the field on search parameter errors', () => {
    const err = new InvalidSearchParameterException('yearMin', 1800, 'Year must be 1900 or later');
    expect(err.getStatus()).toBe(400);
    expect(err.getResponse()).toEqual({
      statusCode: 400,
      error: 'Invalid Search Parameter',
      message: "Invalid value for field 'yearMin': 1800. Year must be 1900 or later",
      field: 'yearMin',
    });
  });

  it('reports duplicates as conflicts', () => {
    const err = new DuplicateMovieException('The Quiet Orbit', 'Mara Lindqvist');
    expect(err.getStatus()).toBe(409);
    expect(err.message).toBe("Movie 'The Quiet Orbit' by director 'Mara Lindqvist' already exists");
  });
});
