// @outline-admin/sdk - Structured logging with pino

import { pino, type Logger } from 'pino';
import type { Config } from './config.js';

let _logger: Logger | null = null;

/**
 * Initialize the global logger.
 * Level and format come from the given config, or LOG_LEVEL / LOG_FORMAT when none is passed.
 */
export function initLogger(config?: Pick<Config, 'logLevel' | 'logFormat'>): Logger {
  const level = config?.logLevel ?? process.env.LOG_LEVEL ?? 'info';
  const format = config?.logFormat ?? process.env.LOG_FORMAT ?? 'json';
  _logger = pino({
    name: 'outline-admin',
    level,
    transport:
      format === 'pretty'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
  return _logger;
}

/**
 * Get the global logger instance (lazy-initialized if needed).
 */
export function getLogger(): Logger {
  if (!_logger) {
    _logger = initLogger();
  }
  return _logger;
}
