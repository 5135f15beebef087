import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../types.ts';

export interface ConcurrencyLimitOptions {
  /** Requests served at the same time */
  max: number;
  logger?: Logger;
}

/**
 * Cap the number of requests in flight; the rest wait in arrival order.
 *
 * A slot is held until the response closes, whether it finished or the client
 * disconnected, so a long download occupies one slot for its whole duration.
 * Requests whose client leaves while still queued never start.
 */
export function limitConcurrency(options: ConcurrencyLimitOptions): RequestHandler {
  const { max, logger } = options;
  if (!Number.isInteger(max) || max < 1) {
    throw new RangeError(`max must be a positive integer, got ${max}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const release = () => {
    active--;
    const next = waiting.shift();
    if (next) next();
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const start = () => {
      if (req.socket.destroyed) {
        // Gave up while queued; pass the slot straight on
        const following = waiting.shift();
        if (following) following();
        return;
      }
      active++;
      res.once('close', release);
      next();
    };

    if (active < max) {
      start();
      return;
    }

    logger?.debug(`Queued ${req.method} ${req.originalUrl} (${active} in flight, ${waiting.length} waiting)`);
    waiting.push(start);
  };
}
