import type { LogLevel } from './observer.js';

/**
 * Base URL used when none is configured
 */
export const DEFAULT_BASE_URL = 'https://api.shovels.ai/v2';

/**
 * Header carrying the API key on every request
 */
export const API_KEY_HEADER = 'X-API-Key';

/**
 * Connection settings for the client
 */
export interface ClientConfiguration {
  /** API key sent in the X-API-Key header */
  apiKey: string;

  /** API root, without a trailing slash */
  baseUrl: string;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Minimum level written by the default console observer */
  logLevel: LogLevel;
}

/**
 * Source of the current time, used for default date windows
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
