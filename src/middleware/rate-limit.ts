import { NextFunction, Request, Response } from 'express';
import { RateLimiter } from '@/infra/rate-limiting/rate-limiter';
import { jsonError } from '@/shared/output';

/**
 * Per-client token bucket for an HTTP route. Each client IP gets its own bucket
 * under `${resource}:${ip}`, configured by `resource`.
 */
export const rateLimit =
  (limiter: RateLimiter, resource: string) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const clientKey = req.ip ?? 'unknown';

    try {
      const result = await limiter.tryAcquire(`${resource}:${clientKey}`, 1);
      res.setHeader('X-RateLimit-Remaining', String(Math.max(0, Math.floor(result.remaining))));

      if (!result.allowed) {
        if (Number.isFinite(result.retryAfterMs)) {
          res.setHeader('Retry-After', String(Math.ceil(result.retryAfterMs / 1000)));
        }
        req.log.warn({ resource, clientKey, retryAfterMs: result.retryAfterMs }, 'Client rate limited');
        jsonError(res, req.trace_id, 'Rate limit exceeded. Please slow down your request rate.', 429);
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
