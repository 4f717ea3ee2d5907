import type { ApiItem } from './records.js';
import type { RequestFailure } from './result.js';

/**
 * Opaque continuation token issued by the server
 */
export type PaginationCursor = string;

/** Smallest page size the API accepts */
export const MIN_PAGE_SIZE = 1;

/** Largest page size the API accepts */
export const MAX_PAGE_SIZE = 100;

/**
 * Caller-controlled pagination parameters for one fetch chain
 */
export interface PaginationOptions {
  /** Page number for offset pagination (>= 1) */
  page?: number;

  /** Items per page (1..100) */
  size?: number;

  /** Cursor to resume a cursor-paginated chain from */
  cursor?: PaginationCursor;

  /** Maximum number of HTTP calls in the chain */
  maxIterations?: number;
}

/**
 * How a page response says the chain continues.
 *
 * `next` is null when the server signals the last page.
 */
export type Continuation =
  | { kind: 'none' }
  | { kind: 'cursor'; next: PaginationCursor | null }
  | { kind: 'page'; next: number | null };

/**
 * Decoded page of results
 */
export interface PageResponse {
  items: ApiItem[];
  continuation: Continuation;

  /** Informational item count reported by the server */
  size?: number;
}

/**
 * Terminal state of a fetch chain
 */
export type PaginationStatus = 'done' | 'failed';

/**
 * Everything a finished fetch chain produced
 */
export interface PaginationOutcome {
  /** Items in arrival order (partial when status is 'failed') */
  items: ApiItem[];

  /** Number of HTTP calls attempted */
  iterations: number;

  status: PaginationStatus;

  /** Why the chain stopped early */
  failure?: RequestFailure;

  elapsedMs: number;
}
