import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { createLoggerWithTrace, Logger } from '@/config/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      trace_id: string;
      log: Logger;
    }
  }
}

const TRACE_HEADER = 'X-Trace-Id';
const TRACE_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

// Reuses a caller's trace id when it is well formed
export const traceMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get(TRACE_HEADER);
  req.trace_id = incoming && TRACE_ID_PATTERN.test(incoming) ? incoming : randomUUID();

  req.log = createLoggerWithTrace(req.trace_id);

  res.setHeader(TRACE_HEADER, req.trace_id);

  next();
};
