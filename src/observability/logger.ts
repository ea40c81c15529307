// ──────────────────────────────────────────
// Observability: structured logger (pino)
// ──────────────────────────────────────────

import pino, { type Logger } from 'pino';
import type { LoggerConfig } from '../shared/types';

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const level = process.env.LOG_LEVEL || config.level || 'info';
  return pino({
    level,
    transport: config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: 'tenant-sessions',
      env: process.env.NODE_ENV || 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger: Logger = createLogger();

export type { Logger };
