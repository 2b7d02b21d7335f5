import { RedisBucketStore, TAKE_TOKENS_SCRIPT, bucketKey } from '@/infra/rate-limiting/redis-bucket-store';

describe('RedisBucketStore', () => {
  const config = { capacity: 5, refillPerSecond: 5 };
  let redis: { eval: jest.Mock };
  let store: RedisBucketStore;

  beforeEach(() => {
    redis = { eval: jest.fn() };
    store = new RedisBucketStore(redis);
  });

  it('should run the take script against the resource hash', async () => {
    redis.eval.mockResolvedValue([1, '4', 0]);

    const result = await store.take('sms', config, 1, 1717243200000);

    expect(redis.eval).toHaveBeenCalledWith(TAKE_TOKENS_SCRIPT, 1, 'ratelimit:{sms}', 5, 5, 1717243200000, 1);
    expect(result).toEqual({ allowed: true, retryAfterMs: 0, remaining: 4 });
  });

  it('should keep fractional token counts', async () => {
    redis.eval.mockResolvedValue([0, '0.25', 150]);

    const result = await store.take('sms', config, 1, 1000);

    expect(result).toEqual({ allowed: false, retryAfterMs: 150, remaining: 0.25 });
  });

  it('should map a bucket that never refills to an infinite wait', async () => {
    redis.eval.mockResolvedValue([0, '0', -1]);

    const result = await store.take('sms', { capacity: 5, refillPerSecond: 0 }, 1, 1000);

    expect(result.retryAfterMs).toBe(Number.POSITIVE_INFINITY);
  });

  it('should reject a reply it does not understand', async () => {
    redis.eval.mockResolvedValue('OK');

    await expect(store.take('sms', config, 1, 1000)).rejects.toThrow('Unexpected rate limiter reply for sms: "OK"');
  });

  it('should propagate Redis failures', async () => {
    redis.eval.mockRejectedValue(new Error('Command timed out'));

    await expect(store.take('sms', config, 1, 1000)).rejects.toThrow('Command timed out');
  });

  it('should hash-tag keys so one resource maps to one slot', () => {
    expect(bucketKey('http:status:203.0.113.9')).toBe('ratelimit:{http:status:203.0.113.9}');
    expect(store.mode).toBe('redis');
  });
});
