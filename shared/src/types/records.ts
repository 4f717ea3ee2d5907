/**
 * A decoded JSON object, such as a response body
 */
export type ApiRecord = Record<string, unknown>;

/**
 * One entry of a page's `items` list, kept exactly as decoded.
 * Usually an object, but the client never inspects it.
 */
export type ApiItem = unknown;

/**
 * Scalar query parameter value
 */
export type QueryScalar = string | number | boolean;

/**
 * Query parameter value. Lists are sent as repeated keys.
 */
export type QueryValue = QueryScalar | readonly QueryScalar[] | null | undefined;

/**
 * Flat query parameter mapping
 */
export type QueryParams = Record<string, QueryValue>;

/**
 * Checks that a decoded JSON value is a plain object
 */
export function isRecord(value: unknown): value is ApiRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
