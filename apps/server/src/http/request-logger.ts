import type { RequestHandler } from 'express';
import { generateUlid } from '@barflow/shared';
import { logger } from '@barflow/core/observability/logger';

/** Assigns a request id (or keeps the caller's `x-request-id`) and logs each response. */
export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : generateUlid();
    const started = process.hrtime.bigint();
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const durationMs = Number((process.hrtime.bigint() - started) / 1_000_000n);
      const userId = res.locals.userId;
      const fields = {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs,
        userId: typeof userId === 'number' ? userId : undefined,
      };
      if (res.statusCode >= 500) logger.error('Request failed', fields);
      else logger.info('Request completed', fields);
    });

    next();
  };
}
