/**
 * Root pino logger for the CLI.
 *
 * Logs go to stderr so they never interleave with the progress bar and
 * summary on stdout.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createCliLogger(level: LogLevel = 'warn'): Logger {
  return pino({ name: 'corpus-sync', level }, pino.destination(2));
}
