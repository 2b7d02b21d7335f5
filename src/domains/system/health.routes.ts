import { Router } from 'express';
import { HealthDependencies, healthController } from './health.controller';

export const createHealthRoutes = (deps: HealthDependencies): Router => {
  const router = Router();

  router.get('/health', healthController(deps));

  return router;
};
