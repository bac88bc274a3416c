export const MIN_AGGREGATE = 0;
export const MAX_AGGREGATE = 10;

/**
 * Aggregate rating of a movie from its review scores: the arithmetic mean
 * rounded half-up to one decimal place, or `null` when there is nothing to
 * aggregate.
 *
 * `mean * 10` is normalised to 12 significant digits before rounding so that
 * binary noise (8.25 stored as 8.2499999...) does not flip the rounding
 * direction.
 */
export function computeAggregate(ratings: readonly number[]): number | null {
  if (ratings.length === 0) return null;
  const sum = ratings.reduce((acc, r) => acc + r, 0);
  const scaled = Number(((sum / ratings.length) * 10).toPrecision(12));
  const rounded = Math.floor(scaled + 0.5) / 10;
  if (!Number.isFinite(rounded)) return null;
  return Math.min(MAX_AGGREGATE, Math.max(MIN_AGGREGATE, rounded));
}
