import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type CreateLoggerOptions = {
  name: string;
  level?: LogLevel;
  /** Defaults to stderr, leaving stdout to command output. */
  destination?: DestinationStream;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const destination = options.destination ?? pino.destination({ dest: 2, sync: true });
  return pino({ name: options.name, level: options.level ?? 'info' }, destination);
}
