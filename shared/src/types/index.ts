// Record and query types
export type {
  ApiRecord,
  ApiItem,
  QueryScalar,
  QueryValue,
  QueryParams,
} from './records.js';

export { isRecord } from './records.js';

// Result types
export type { Result, RequestFailure } from './result.js';

export { ok, fail, describeFailure } from './result.js';

// Pagination types
export type {
  PaginationCursor,
  PaginationOptions,
  Continuation,
  PageResponse,
  PaginationStatus,
  PaginationOutcome,
} from './pagination.js';

export { MIN_PAGE_SIZE, MAX_PAGE_SIZE } from './pagination.js';

// Observer types
export type { LogLevel, Observer } from './observer.js';

export { LOG_LEVELS, isValidLogLevel, isLevelEnabled } from './observer.js';

// Configuration types
export type { ClientConfiguration, Clock } from './config.js';

export { DEFAULT_BASE_URL, API_KEY_HEADER, systemClock } from './config.js';

// Location levels
export type { LocationLevel, MetricsLevel, DetailsLevel } from './locations.js';

export {
  LOCATION_LEVELS,
  METRICS_LEVELS,
  DETAILS_LEVELS,
  isLocationLevel,
  isMetricsLevel,
  isDetailsLevel,
} from './locations.js';
