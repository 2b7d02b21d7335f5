import { Router } from 'express';
import { RESOURCE_HTTP_STATUS } from '@/config/constants';
import { RateLimiter } from '@/infra/rate-limiting/rate-limiter';
import { rateLimit } from '@/middleware/rate-limit';
import { DeliveryController } from './delivery.controller';
import { DeliveryService } from './delivery.service';

export const createDeliveryRoutes = (deliveryService: DeliveryService, rateLimiter: RateLimiter): Router => {
  const router = Router();
  const controller = new DeliveryController(deliveryService);

  router.get(
    '/deliveries/:subscriberId/:day',
    rateLimit(rateLimiter, RESOURCE_HTTP_STATUS),
    controller.getStatus
  );

  return router;
};
