import type { Clock, QueryParams } from '@shovels-client/shared';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Length of the default date window, in days */
export const DEFAULT_WINDOW_DAYS = 180;

/**
 * Format a date as YYYY-MM-DD (UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Window ending today and starting `days` days earlier
 */
export function defaultDateWindow(
  clock: Clock,
  days: number = DEFAULT_WINDOW_DAYS,
): { from: string; to: string } {
  const now = clock.now();
  return {
    from: formatDate(new Date(now.getTime() - days * DAY_MS)),
    to: formatDate(now),
  };
}

/**
 * Copy params, filling empty `fromKey`/`toKey` values with the default window.
 * Caller-supplied dates are kept.
 */
export function withDateDefaults(
  params: QueryParams | undefined,
  fromKey: string,
  toKey: string,
  clock: Clock,
): QueryParams {
  const window = defaultDateWindow(clock);
  const result: QueryParams = { ...params };
  result[fromKey] = result[fromKey] || window.from;
  result[toKey] = result[toKey] || window.to;
  return result;
}
