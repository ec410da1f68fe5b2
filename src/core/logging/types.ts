import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, unwrapped.
 *
 * Data-first call style:
 *   logger.info({ remoteId }, 'Gist loaded');
 *   logger.warn({ err: error }, 'Token cache write failed');
 */
export type Logger = PinoLogger;

/** Creates one child logger per component. */
export interface ILoggerFactory {
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
