import pino from 'pino';
import type { Env } from '../config/env.js';

export type Logger = pino.Logger;

// Connection strings and bot tokens can ride along in logged option objects
const REDACT_PATHS = ['botToken', '*.botToken', 'connectionString', '*.connectionString', 'DATABASE_URL'];

/**
 * The process logger. Built once in the entry point and handed down through the app context;
 * components derive `logger.child({ component })` from it.
 */
export function createLogger(env: Pick<Env, 'WORKER_LOG_LEVEL' | 'NODE_ENV'>): Logger {
  return pino({
    level: env.NODE_ENV === 'test' ? 'silent' : env.WORKER_LOG_LEVEL,
    ...(env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname,service,env',
            },
          },
        }
      : {}),
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'car-watch-worker',
      env: env.NODE_ENV,
    },
  });
}
