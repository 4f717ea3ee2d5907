/**
 * Console Observer
 *
 * Default observer that writes prefixed lines to the console,
 * dropping records below a minimum level.
 */

import { isLevelEnabled, type LogLevel, type Observer } from '@shovels-client/shared';

export interface ConsoleObserverOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;

  /** Tag at the start of every line (default: Shovels) */
  prefix?: string;
}

export class ConsoleObserver implements Observer {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(options: ConsoleObserverOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? 'Shovels';
  }

  record(level: LogLevel, message: string): void {
    if (!isLevelEnabled(level, this.level)) {
      return;
    }

    const line = `[${this.prefix}] ${message}`;

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(options: ConsoleObserverOptions = {}): ConsoleObserver {
  return new ConsoleObserver(options);
}

/**
 * Observer that discards every record
 */
export const silentObserver: Observer = {
  record: () => undefined,
};
