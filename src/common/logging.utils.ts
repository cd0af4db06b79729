/**
 * Helpers for log output
 */
import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 100;

export const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Serialize a value for logging, shortening it to avoid huge log entries
 */
export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = JSON.stringify(data) ?? String(data);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

/**
 * Get enabled log levels based on minimum level.
 * NestJS uses cumulative log levels, so 'debug' includes error, warn, log, and debug.
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  if (!isLogLevel(minLevel)) {
    return ['error', 'warn', 'log'];
  }
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(minLevel) + 1);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
