import express, { Express, Router } from 'express';
import { traceMiddleware } from '@/middleware/trace';
import { errorHandler, notFoundHandler } from '@/middleware/error-handler';

export function createApp(router: Router, trustProxy = false): Express {
  const app = express();

  // req.ip keys the per-client rate limit; behind a proxy it must come from X-Forwarded-For
  app.set('trust proxy', trustProxy);

  app.use(express.json());

  // Trace ID middleware (must be first)
  app.use(traceMiddleware);

  app.use(router);

  // 404 handler
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
