import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logError } from '@/config/logger';
import { NotFoundError, SchedulingError, TimezoneError } from '@/shared/errors';
import { jsonError } from '@/shared/output';

const statusFor = (error: Error): number => {
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof SchedulingError || error instanceof TimezoneError || error instanceof ZodError) {
    return 400;
  }
  return 500;
};

export function errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
  const trace_id = req.trace_id || 'unknown';
  const statusCode = statusFor(error);

  logError(trace_id, error, {
    path: req.path,
    method: req.method,
    statusCode,
  });

  jsonError(res, trace_id, statusCode === 500 ? 'An unexpected error occurred' : error.message, statusCode);
}

// 404 handler for undefined routes
export function notFoundHandler(req: Request, res: Response): void {
  const trace_id = req.trace_id || 'unknown';

  jsonError(res, trace_id, `Route ${req.method} ${req.path} not found`, 404);
}
