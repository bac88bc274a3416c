import { InvalidSearchParameterException } from '../exceptions/catalog.exceptions';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type SortDirection = 'asc' | 'desc';

export interface SortSpec<F extends string = string> {
  field: F;
  direction: SortDirection;
}

export interface PageRequest {
  page: number;
  size: number;
  offset: number;
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  numberOfElements: number;
  totalElements: number;
  totalPages: number;
  first: boolean;
  last: boolean;
  hasNext: boolean;
  hasPrevious: boolean;
  empty: boolean;
  sort?: SortSpec;
}

/**
 * Turns raw page/size query values into safe bounds.
 * size is clamped into [1, 100]; a negative page, or one whose offset is not a
 * safe integer, is rejected.
 */
export function normalizePageRequest(
  rawPage?: number | null,
  rawSize?: number | null,
): PageRequest {
  const page = rawPage ?? 0;
  if (!Number.isInteger(page) || page < 0) {
    throw new InvalidSearchParameterException(
      'page',
      page,
      'Page index must be a non-negative integer',
    );
  }
  let size = rawSize ?? DEFAULT_PAGE_SIZE;
  size = Number.isFinite(size) ? Math.trunc(size) : DEFAULT_PAGE_SIZE;
  if (size < 1) size = 1;
  if (size > MAX_PAGE_SIZE) size = MAX_PAGE_SIZE;
  const offset = page * size;
  if (offset > Number.MAX_SAFE_INTEGER) {
    throw new InvalidSearchParameterException('page', page, 'Page index is too large');
  }
  return { page, size, offset };
}

export function toPage<T>(
  content: T[],
  totalElements: number,
  request: PageRequest,
  sort?: SortSpec,
): Page<T> {
  const totalPages = Math.ceil(totalElements / request.size);
  const hasNext = request.page + 1 < totalPages;
  return {
    content,
    page: request.page,
    size: request.size,
    numberOfElements: content.length,
    totalElements,
    totalPages,
    first: request.page === 0,
    last: !hasNext,
    hasNext,
    hasPrevious: request.page > 0,
    empty: content.length === 0,
    ...(sort ? { sort } : {}),
  };
}

/**
 * Reads a `(field, direction)` pair against an allow-list. Unknown fields and
 * directions are rejected rather than silently replaced.
 */
export function parseSortSpec<F extends string>(
  allowed: readonly F[],
  rawField: string | undefined,
  rawDirection: string | undefined,
  fallback: SortSpec<F>,
): SortSpec<F> {
  let field = fallback.field;
  if (rawField !== undefined) {
    const match = allowed.find((candidate) => candidate === rawField.trim());
    if (match === undefined) {
      throw new InvalidSearchParameterException(
        'sortBy',
        rawField,
        `Sort field must be one of: ${allowed.join(', ')}`,
      );
    }
    field = match;
  }
  let direction = fallback.direction;
  if (rawDirection !== undefined) {
    const normalized = rawDirection.trim().toLowerCase();
    if (normalized !== 'asc' && normalized !== 'desc') {
      throw new InvalidSearchParameterException(
        'sortOrder',
        rawDirection,
        'Sort direction must be asc or desc',
      );
    }
    direction = normalized;
  }
  return { field, direction };
}
