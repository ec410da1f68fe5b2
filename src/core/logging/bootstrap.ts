import type { Logger, LogLevel } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs before the container exists (config loading,
 * container wiring). Level comes straight from PSVG_LOG_LEVEL; after
 * startup, use the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function envLevel(): LogLevel {
  const raw = process.env['PSVG_LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((l) => l === raw) ?? 'silent';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(envLevel());
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
