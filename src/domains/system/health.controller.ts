import { Request, Response } from 'express';
import { DataSource } from 'typeorm';
import { RateLimitStoreMode } from '@/infra/rate-limiting/rate-limit.types';
import { jsonOk } from '@/shared/output';
import { BreakerGuarded, BreakerStats } from '@/shared/types';

export interface HealthDependencies {
  dataSource: Pick<DataSource, 'isInitialized'>;
  rateLimitStore: RateLimitStoreMode;
  breakers: Record<string, BreakerGuarded>;
}

/**
 * Liveness plus dependency state. An open breaker degrades the report but still
 * answers 200: the process is up and recovers on its own.
 */
export const healthController =
  (deps: HealthDependencies) =>
  (req: Request, res: Response): void => {
    const breakers: Record<string, BreakerStats> = {};
    for (const [name, service] of Object.entries(deps.breakers)) {
      breakers[name] = service.getStats();
    }
    const degraded = Object.values(breakers).some(stats => stats.status === 'open');

    const healthCheck = {
      status: degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: deps.dataSource.isInitialized ? 'connected' : 'disconnected',
      rateLimitStore: deps.rateLimitStore,
      breakers,
    };

    jsonOk(res, req.trace_id, degraded ? 'System degraded' : 'System healthy', healthCheck);
  };
