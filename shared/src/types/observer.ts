/**
 * Diagnostic levels, least to most severe
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All valid levels in severity order
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Receives diagnostic records from the client.
 *
 * The client never depends on a concrete logger, only on this.
 */
export interface Observer {
  record(level: LogLevel, message: string): void;
}

/**
 * Validates that a string is a valid LogLevel
 */
export function isValidLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.includes(value as LogLevel);
}

/**
 * True when a record at `level` passes a `minimum` threshold
 */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
}
