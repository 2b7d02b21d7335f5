import { Router } from 'express';
import { DataSource } from 'typeorm';
import { Container } from '@/container';
import { createDeliveryRoutes } from '@/domains/delivery/delivery.routes';
import { createHealthRoutes } from '@/domains/system/health.routes';

export const createRouter = (container: Container, dataSource: DataSource): Router => {
  const router = Router();

  router.use(
    createHealthRoutes({
      dataSource,
      rateLimitStore: container.rateLimiter.mode,
      breakers: { generation: container.generationService, sms: container.smsGateway },
    })
  );
  router.use(createDeliveryRoutes(container.deliveryService, container.rateLimiter));

  return router;
};
