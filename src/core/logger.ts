/**
 * Logger setup.
 */

import { pino, type Logger } from 'pino';
import type { LoggingConfig } from './config/schema.js';

/**
 * Create a logger with sensible defaults.
 * Pretty output goes through the pino-pretty transport.
 */
export function createLogger(config: Partial<LoggingConfig> = {}): Logger {
  const level = config.level ?? process.env['LOG_LEVEL'] ?? 'info';

  if (config.prettyPrint) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level });
}

/**
 * Logger used when a component is constructed without one.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
