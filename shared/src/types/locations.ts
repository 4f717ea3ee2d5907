/**
 * Geographic levels exposed by the API
 *
 * Each level has its own search, details and metrics endpoints, though
 * not every endpoint exists for every level.
 */

/**
 * Levels that support text search
 */
export type LocationLevel =
  | 'states'
  | 'zipcodes'
  | 'jurisdictions'
  | 'counties'
  | 'cities'
  | 'addresses';

/**
 * Levels with monthly and current metrics endpoints
 */
export type MetricsLevel = 'jurisdictions' | 'counties' | 'cities' | 'addresses';

/**
 * Levels with a details endpoint. Addresses use the residents endpoint instead.
 */
export type DetailsLevel = 'jurisdictions' | 'counties' | 'cities';

export const LOCATION_LEVELS: readonly LocationLevel[] = [
  'states',
  'zipcodes',
  'jurisdictions',
  'counties',
  'cities',
  'addresses',
] as const;

export const METRICS_LEVELS: readonly MetricsLevel[] = [
  'jurisdictions',
  'counties',
  'cities',
  'addresses',
] as const;

export const DETAILS_LEVELS: readonly DetailsLevel[] = ['jurisdictions', 'counties', 'cities'] as const;

export function isLocationLevel(value: unknown): value is LocationLevel {
  return typeof value === 'string' && LOCATION_LEVELS.includes(value as LocationLevel);
}

export function isMetricsLevel(value: unknown): value is MetricsLevel {
  return typeof value === 'string' && METRICS_LEVELS.includes(value as MetricsLevel);
}

export function isDetailsLevel(value: unknown): value is DetailsLevel {
  return typeof value === 'string' && DETAILS_LEVELS.includes(value as DetailsLevel);
}
