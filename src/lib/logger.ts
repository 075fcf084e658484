// src/lib/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Build the process logger.
 * Pretty output in development, JSON otherwise, silent under test unless LOG_LEVEL is set.
 * Everything goes to stderr so report tables on stdout stay clean.
 * Modules take a child via `log.child({ module })`.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const nodeEnv = env.NODE_ENV || 'development';
  const level = env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info');

  if (nodeEnv === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

