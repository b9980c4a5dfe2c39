/**
 * Structured logging
 *
 * Pino logger tagged with the service name. Per-card child loggers add the
 * card slug so every line of a render pass can be grouped.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerConfig {
  /** Service name */
  service: string;
  /** Log level (default: info) */
  level?: string;
  /** Destination file descriptor (default: stderr, keeping stdout for the summary) */
  destination?: number;
}

/**
 * Create the process logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ service: 'card-press', level: 'debug' });
 * logger.child({ card: 'test-bear' }).info('rendered');
 * ```
 */
export function createLogger(opts: LoggerConfig): Logger {
  const pinoOpts: LoggerOptions = {
    name: opts.service,
    level: opts.level ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    mixin() {
      return { service: opts.service };
    },
  };

  return pino(pinoOpts, pino.destination(opts.destination ?? 2));
}

/** Logger that drops everything; used by tests and library callers without one */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
