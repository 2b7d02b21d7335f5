import { z } from 'zod';
import { errorHandler, notFoundHandler } from '@/middleware/error-handler';
import { InvalidWindowError, NotFoundError, SchedulingError } from '@/shared/errors';
import { MockResponse, mockRequest } from '../support/http';

describe('errorHandler', () => {
  const handle = (error: Error) => {
    const res = new MockResponse();
    errorHandler(error, mockRequest({ trace_id: 'trace-42', path: '/deliveries/sub-1/2024-03-09' }), res.asResponse(), jest.fn());
    return res;
  };

  it('should map NotFoundError to 404', () => {
    const res = handle(new NotFoundError('Delivery not found for subscriber sub-1 on 2024-03-09'));

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: 'Delivery not found for subscriber sub-1 on 2024-03-09',
      trace_id: 'trace-42',
    });
  });

  it('should map scheduling and timezone errors to 400', () => {
    expect(handle(new SchedulingError('Invalid day: tomorrow, expected yyyy-MM-dd')).statusCode).toBe(400);
    expect(handle(new InvalidWindowError(17, 12)).statusCode).toBe(400);
  });

  it('should map validation errors to 400', () => {
    const result = z.object({ day: z.string() }).safeParse({ day: 9 });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    expect(handle(result.error).statusCode).toBe(400);
  });

  it('should hide the message of unexpected errors', () => {
    const res = handle(new Error('connection refused to 10.0.0.5:5432'));

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'An unexpected error occurred', trace_id: 'trace-42' });
  });
});

describe('notFoundHandler', () => {
  it('should name the missing route', () => {
    const res = new MockResponse();

    notFoundHandler(mockRequest({ method: 'POST', path: '/deliveries', trace_id: 'trace-7' }), res.asResponse());

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Route POST /deliveries not found', trace_id: 'trace-7' });
  });
});
