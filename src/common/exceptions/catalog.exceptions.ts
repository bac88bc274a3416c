import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';

/** Longest string echoed back inside an error message. */
const MAX_ECHOED_LENGTH = 100;

export function describeInvalidValue(
  field: string,
  value: unknown,
  reason: string,
): string {
  const echoable =
    typeof value === 'number' ||
    (typeof value === 'string' && value.length <= MAX_ECHOED_LENGTH);
  return echoable
    ? `Invalid value for field '${field}': ${String(value)}. ${reason}`
    : `Invalid value for field '${field}'. ${reason}`;
}

export class MovieNotFoundException extends NotFoundException {
  constructor(readonly movieId: number) {
    super({
      statusCode: 404,
      error: 'Movie Not Found',
      message: `Movie with ID ${movieId} not found`,
    });
  }
}

export class ReviewNotFoundException extends NotFoundException {
  constructor(
    readonly reviewId: number,
    readonly movieId?: number,
  ) {
    super({
      statusCode: 404,
      error: 'Review Not Found',
      message:
        movieId === undefined
          ? `Review with ID ${reviewId} not found`
          : `Review with ID ${reviewId} not found for movie with ID ${movieId}`,
    });
  }
}

/**
 * Base for field-level validation failures. The response body carries the
 * offending field so clients can map it back to a form input.
 */
abstract class FieldValidationException extends BadRequestException {
  protected constructor(
    error: string,
    readonly field: string,
    readonly value: unknown,
    readonly reason: string,
  ) {
    super({
      statusCode: 400,
      error,
      message: describeInvalidValue(field, value, reason),
      field,
    });
  }
}

export class InvalidReviewDataException extends FieldValidationException {
  constructor(field: string, value: unknown, reason: string) {
    super('Invalid Review Data', field, value, reason);
  }
}

export class InvalidSearchParameterException extends FieldValidationException {
  constructor(field: string, value: unknown, reason: string) {
    super('Invalid Search Parameter', field, value, reason);
  }
}

export class InvalidMovieDataException extends FieldValidationException {
  constructor(field: string, value: unknown, reason: string) {
    super('Invalid Movie Data', field, value, reason);
  }
}

export class DuplicateMovieException extends ConflictException {
  constructor(
    readonly title: string,
    readonly director: string,
  ) {
    super(`Movie '${title}' by director '${director}' already exists`);
  }
}
