/**
 * Toolgate Runtime Host: Operational Logger
 *
 * Builds the root pino logger. Components never create their own; they
 * receive this one and derive `child` loggers tagged with a component name.
 *
 * Lines go to stderr by default so stdout stays reserved for command
 * output.
 */

import { destination, pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { REDACT_CENSOR, REDACT_PATHS } from './redaction.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  /** Defaults to a synchronous stderr destination. */
  readonly destination?: DestinationStream | undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? 'info',
      base: { system: 'toolgate' },
      redact: { paths: [...REDACT_PATHS], censor: REDACT_CENSOR },
    },
    options.destination ?? destination({ dest: 2, sync: true }),
  );
}
