/**
 * Logging Middleware - One line per finished or aborted request
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../types.ts';

/**
 * Logging middleware configuration
 */
export interface LoggingMiddlewareOptions {
  /** Logger the request lines go to */
  logger: Logger;
  /** Clock in milliseconds, swapped out in tests */
  now?: () => number;
}

/**
 * Create request logging middleware
 *
 * Logs `METHOD path status durationms` once the response has been sent, or
 * `METHOD path aborted` when the client went away first.
 *
 * @example
 * ```typescript
 * app.use(createRequestLogging({ logger }));
 * app.use(createTransferRouter(config, { logger }));
 * ```
 */
export function createRequestLogging(options: LoggingMiddlewareOptions): RequestHandler {
  const { logger, now = Date.now } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = now();
    const { method, originalUrl } = req;

    res.once('close', () => {
      if (res.writableFinished) {
        logger.info(`${method} ${originalUrl} ${res.statusCode} ${now() - startedAt}ms`);
      } else {
        logger.debug(`${method} ${originalUrl} aborted after ${now() - startedAt}ms`);
      }
    });

    next();
  };
}
