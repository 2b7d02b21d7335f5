import { NextFunction, Request, Response } from 'express';
import { jsonOk } from '@/shared/output';
import { DeliveryService } from './delivery.service';

export class DeliveryController {
  constructor(private readonly deliveryService: DeliveryService) {}

  getStatus = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { subscriberId, day } = req.params;
      const status = await this.deliveryService.getDeliveryStatus(subscriberId, day);

      jsonOk(res, req.trace_id, 'Delivery retrieved successfully', status);
    } catch (error) {
      next(error);
    }
  };
}
