import { ValidationError } from './errors.js';
import { MAX_PAGE_SIZE, MIN_PAGE_SIZE, type PaginationOptions } from './types/pagination.js';

/**
 * Validates pagination options and throws on the first violation
 * @throws ValidationError if page, size or maxIterations is out of range
 */
export function validatePaginationOptions(options: PaginationOptions): void {
  const { page, size, maxIterations } = options;

  if (page !== undefined && (!Number.isInteger(page) || page < 1)) {
    throw new ValidationError('page must be greater than or equal to 1', { page });
  }

  if (size !== undefined && (!Number.isInteger(size) || size < MIN_PAGE_SIZE || size > MAX_PAGE_SIZE)) {
    throw new ValidationError(`size must be between ${MIN_PAGE_SIZE} and ${MAX_PAGE_SIZE}`, { size });
  }

  if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
    throw new ValidationError('maxIterations must be greater than or equal to 1', { maxIterations });
  }
}

/**
 * Throws unless every named key is present in params with a value.
 * Null counts as missing since null values are left out of the query.
 */
export function requireParams(
  params: Record<string, unknown>,
  keys: readonly string[],
  context: string,
): void {
  for (const key of keys) {
    if (params[key] === undefined || params[key] === null) {
      throw new ValidationError(`${key} is required for ${context}`, { missing: key });
    }
  }
}

/**
 * Normalizes a single ID or a list of IDs to a list
 */
export function toIdList(ids: string | readonly string[]): string[] {
  return typeof ids === 'string' ? [ids] : [...ids];
}
