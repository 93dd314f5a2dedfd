/**
 * Structured JSON logging with pino.
 *
 * Features:
 * - JSON format by default, pretty when LOG_FORMAT=pretty
 * - Log level configurable via LOG_LEVEL env var
 * - Per-request child loggers carrying a correlation ID
 */

import pino from 'pino';
import { getConfig } from '../config.js';

let _logger: pino.Logger | null = null;

/**
 * Initialize the global logger from config.
 * Call once at startup after config is available.
 */
export function initLogger(): pino.Logger {
  const config = getConfig();
  _logger = pino({
    level: config.logLevel,
    transport:
      config.logFormat === 'pretty'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
  return _logger;
}

/**
 * Get the global logger instance (lazy-initialized if needed).
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = initLogger();
  }
  return _logger;
}

/**
 * Create a child logger with a request correlation ID.
 */
export function createRequestLogger(requestId: string): pino.Logger {
  return getLogger().child({ requestId });
}

/**
 * Drop the global logger so the next call re-reads config (for testing).
 */
export function resetLogger(): void {
  _logger = null;
}
