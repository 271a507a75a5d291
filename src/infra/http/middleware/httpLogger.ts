import { pinoHttp, type HttpLogger } from 'pino-http';
import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger } from '../../logger.js';

const QUIET_PATHS = new Set(['/api/v1/health', '/favicon.ico']);

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Access log. Reuses an inbound `x-request-id` (or mints one) and echoes it
 * back so callers can correlate.
 */
export function createHttpLogger(logger: Logger): HttpLogger {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = headerValue(req.headers['x-request-id']) || randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },

    // 4xx are the caller's problem; keep them out of the error stream.
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ''),
    },

    serializers: {
      req(req: { id: unknown; method: string; url: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
