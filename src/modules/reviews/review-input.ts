import { InvalidReviewDataException } from '../../common/exceptions/catalog.exceptions';

export const USER_NAME_MAX_LENGTH = 100;
export const REVIEW_TEXT_MAX_LENGTH = 2000;
export const MIN_REVIEW_RATING = 1;
export const MAX_REVIEW_RATING = 10;

/** Loosely typed review payload as it arrives from a caller. */
export interface ReviewInput {
  user_name?: string | null;
  review_text?: string | null;
  rating?: number | null;
}

/** The user-mutable fields of a review after validation. */
export interface ReviewData {
  user_name: string;
  review_text: string | null;
  rating: number;
}

export function validateReviewInput(input: ReviewInput): ReviewData {
  const userName = input.user_name?.trim() ?? '';
  if (userName.length === 0) {
    throw new InvalidReviewDataException(
      'user_name',
      input.user_name ?? null,
      'User name cannot be blank',
    );
  }
  if (userName.length > USER_NAME_MAX_LENGTH) {
    throw new InvalidReviewDataException(
      'user_name',
      userName,
      `User name cannot exceed ${USER_NAME_MAX_LENGTH} characters`,
    );
  }

  const reviewText = input.review_text ?? null;
  if (reviewText !== null && reviewText.length > REVIEW_TEXT_MAX_LENGTH) {
    throw new InvalidReviewDataException(
      'review_text',
      reviewText,
      `Review text cannot exceed ${REVIEW_TEXT_MAX_LENGTH} characters`,
    );
  }

  const rating = input.rating;
  if (rating === undefined || rating === null) {
    throw new InvalidReviewDataException('rating', null, 'Rating cannot be null');
  }
  if (!Number.isFinite(rating)) {
    throw new InvalidReviewDataException('rating', rating, 'Rating must be a finite number');
  }
  if (rating < MIN_REVIEW_RATING) {
    throw new InvalidReviewDataException('rating', rating, 'Rating must be at least 1.0');
  }
  if (rating > MAX_REVIEW_RATING) {
    throw new InvalidReviewDataException('rating', rating, 'Rating cannot exceed 10.0');
  }

  return { user_name: userName, review_text: reviewText, rating };
}
