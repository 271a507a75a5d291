import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * Root logger. Everything else takes a child of this one so lines carry
 * `{ service }` and whatever component bindings the caller adds.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({
    level,
    base: { service: 'users-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['req.headers.authorization', 'password', '*.password', 'passwordHash', '*.passwordHash'],
      censor: '[redacted]',
    },
  });
}

/** Logger for unit tests and scripts that do not care about output. */
export const silentLogger: Logger = pino({ level: 'silent' });
