import type { ApiRecord, Continuation, PageResponse } from '@shovels-client/shared';

function toCursor(value: unknown): string | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

function toPageNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const page = parseInt(value, 10);
    return page >= 1 ? page : null;
  }
  return null;
}

/**
 * Read the continuation from a decoded body.
 *
 * `next_cursor` is checked before `next_page`; a key that is present
 * with an empty value means the last page.
 */
export function parseContinuation(body: ApiRecord): Continuation {
  if ('next_cursor' in body) {
    return { kind: 'cursor', next: toCursor(body['next_cursor']) };
  }
  if ('next_page' in body) {
    return { kind: 'page', next: toPageNumber(body['next_page']) };
  }
  return { kind: 'none' };
}

/**
 * Decode a page body into items and continuation.
 * A missing or malformed `items` field yields no items.
 */
export function parsePageResponse(body: ApiRecord): PageResponse {
  const rawItems = body['items'];
  const items = Array.isArray(rawItems) ? [...rawItems] : [];

  const response: PageResponse = {
    items,
    continuation: parseContinuation(body),
  };

  const size = body['size'];
  if (typeof size === 'number') response.size = size;

  return response;
}
