import { RESOURCE_HTTP_STATUS } from '@/config/constants';
import { LocalBucketStore } from '@/infra/rate-limiting/local-bucket-store';
import { RateLimiter } from '@/infra/rate-limiting/rate-limiter';
import { rateLimit } from '@/middleware/rate-limit';
import { RateLimitConfigError } from '@/shared/errors';
import { MockResponse, mockRequest } from '../support/http';

describe('rateLimit middleware', () => {
  const now = new Date('2024-03-09T18:00:00Z');

  const createLimiter = (capacity: number, refillPerSecond: number) =>
    new RateLimiter(
      new LocalBucketStore(),
      { [RESOURCE_HTTP_STATUS]: { capacity, refillPerSecond } },
      { clock: () => now }
    );

  it('should pass the request on and report the remaining tokens', async () => {
    const middleware = rateLimit(createLimiter(3, 1), RESOURCE_HTTP_STATUS);
    const res = new MockResponse();
    const next = jest.fn();

    await middleware(mockRequest(), res.asResponse(), next);

    expect(next).toHaveBeenCalledWith();
    expect(res.headers.get('x-ratelimit-remaining')).toBe('2');
    expect(res.body).toBeUndefined();
  });

  it('should answer 429 with Retry-After once the client has used its burst', async () => {
    const middleware = rateLimit(createLimiter(1, 0.5), RESOURCE_HTTP_STATUS);
    const next = jest.fn();

    await middleware(mockRequest(), new MockResponse().asResponse(), next);
    const res = new MockResponse();
    await middleware(mockRequest(), res.asResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.statusCode).toBe(429);
    expect(res.headers.get('retry-after')).toBe('2');
    expect(res.headers.get('x-ratelimit-remaining')).toBe('0');
    expect(res.body).toEqual({
      success: false,
      error: 'Rate limit exceeded. Please slow down your request rate.',
      trace_id: 'trace-test',
    });
  });

  it('should omit Retry-After when the bucket never refills', async () => {
    const middleware = rateLimit(createLimiter(1, 0), RESOURCE_HTTP_STATUS);

    await middleware(mockRequest(), new MockResponse().asResponse(), jest.fn());
    const res = new MockResponse();
    await middleware(mockRequest(), res.asResponse(), jest.fn());

    expect(res.statusCode).toBe(429);
    expect(res.headers.has('retry-after')).toBe(false);
  });

  it('should keep a separate bucket per client address', async () => {
    const middleware = rateLimit(createLimiter(1, 0), RESOURCE_HTTP_STATUS);
    const next = jest.fn();

    await middleware(mockRequest({ ip: '203.0.113.9' }), new MockResponse().asResponse(), next);
    await middleware(mockRequest({ ip: '2001:db8::1' }), new MockResponse().asResponse(), next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('should hand limiter errors to the error handler', async () => {
    const middleware = rateLimit(createLimiter(1, 1), 'http:unconfigured');
    const next = jest.fn();

    await middleware(mockRequest(), new MockResponse().asResponse(), next);

    expect(next).toHaveBeenCalledWith(expect.any(RateLimitConfigError));
  });
});
