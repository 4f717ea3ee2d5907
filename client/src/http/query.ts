import type { QueryParams, QueryScalar, QueryValue } from '@shovels-client/shared';

function isList(value: QueryValue): value is readonly QueryScalar[] {
  return Array.isArray(value);
}

/**
 * Merge query parameters into a URL.
 *
 * List values become repeated keys (`id=a&id=b`); null and undefined
 * values are left out.
 */
export function buildUrl(url: string, params: QueryParams = {}): string {
  const target = new URL(url);

  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      continue;
    }
    if (isList(value)) {
      for (const entry of value) {
        target.searchParams.append(key, String(entry));
      }
    } else {
      target.searchParams.append(key, String(value));
    }
  }

  return target.toString();
}
