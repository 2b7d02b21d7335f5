import { DeliveryController } from '@/domains/delivery/delivery.controller';
import { DeliveryStatus } from '@/domains/delivery/delivery.model';
import { DeliveryService } from '@/domains/delivery/delivery.service';
import { EventBus } from '@/infra/events/event-bus';
import { NotFoundError } from '@/shared/errors';
import { MockResponse, mockRequest } from '../../support/http';
import { InMemoryDeliveryStore } from '../../support/in-memory-delivery-store';

describe('DeliveryController', () => {
  let store: InMemoryDeliveryStore;
  let controller: DeliveryController;

  beforeEach(() => {
    store = new InMemoryDeliveryStore();
    controller = new DeliveryController(new DeliveryService(store, new EventBus()));
  });

  it('should respond with the delivery status', async () => {
    const delivery = store.seed({
      subscriberId: 'sub-1',
      deliveryDate: '2024-03-09',
      idempotencyKey: 'sub-1:daily:2024-03-09',
      scheduledAt: new Date('2024-03-09T19:30:00Z'),
      windowEndsAt: new Date('2024-03-09T22:00:00Z'),
    });
    const res = new MockResponse();
    const next = jest.fn();

    await controller.getStatus(
      mockRequest({ params: { subscriberId: 'sub-1', day: '2024-03-09' } }),
      res.asResponse(),
      next
    );

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      message: 'Delivery retrieved successfully',
      data: { id: delivery.id, status: DeliveryStatus.PENDING, scheduledAt: '2024-03-09T19:30:00.000Z' },
    });
  });

  it('should pass a missing delivery to the error handler', async () => {
    const next = jest.fn();

    await controller.getStatus(
      mockRequest({ params: { subscriberId: 'sub-1', day: '2024-03-09' } }),
      new MockResponse().asResponse(),
      next
    );

    expect(next).toHaveBeenCalledWith(expect.any(NotFoundError));
  });
});
