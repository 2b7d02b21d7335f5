import type Redis from 'ioredis';
import { z } from 'zod';
import { AcquireResult, BucketConfig, BucketStore } from './rate-limit.types';

/**
 * Refill-and-debit in a single script so that concurrent workers can never
 * jointly overspend a bucket. Tokens travel as strings because Redis truncates
 * Lua numbers to integers in replies.
 *
 * KEYS[1] bucket hash
 * ARGV    capacity, refill per second, now (epoch ms), cost
 * Returns { allowed (0|1), tokens, retryAfterMs (-1 = never) }
 */
export const TAKE_TOKENS_SCRIPT = `
local capacity = tonumber(ARGV[1])
local rate = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local cost = tonumber(ARGV[4])

local state = redis.call('HMGET', KEYS[1], 'tokens', 'updated_at')
local tokens = tonumber(state[1])
local updated = tonumber(state[2])
if tokens == nil or updated == nil then
  tokens = capacity
  updated = now
end

local elapsed = math.max(0, now - updated)
tokens = math.min(capacity, tokens + elapsed * rate / 1000)
updated = math.max(now, updated)

local allowed = 0
local retry_after = 0
if tokens >= cost then
  tokens = tokens - cost
  allowed = 1
elseif rate > 0 then
  retry_after = math.ceil((cost - tokens) * 1000 / rate)
else
  retry_after = -1
end

redis.call('HSET', KEYS[1], 'tokens', tostring(tokens), 'updated_at', tostring(updated),
  'capacity', tostring(capacity), 'rate', tostring(rate))
if rate > 0 then
  redis.call('PEXPIRE', KEYS[1], math.ceil(capacity * 1000 / rate) + 1000)
end

return { allowed, tostring(tokens), retry_after }
`;

const replySchema = z.tuple([z.number(), z.string(), z.number()]);

export const bucketKey = (resource: string): string => `ratelimit:{${resource}}`;

/**
 * Buckets shared by every worker process through Redis
 */
export class RedisBucketStore implements BucketStore {
  readonly mode = 'redis' as const;

  constructor(private readonly redis: Pick<Redis, 'eval'>) {}

  take = async (resource: string, config: BucketConfig, cost: number, nowMs: number): Promise<AcquireResult> => {
    const reply = await this.redis.eval(
      TAKE_TOKENS_SCRIPT,
      1,
      bucketKey(resource),
      config.capacity,
      config.refillPerSecond,
      nowMs,
      cost
    );

    const parsed = replySchema.safeParse(reply);
    if (!parsed.success) {
      throw new Error(`Unexpected rate limiter reply for ${resource}: ${JSON.stringify(reply)}`);
    }

    const [allowed, tokens, retryAfterMs] = parsed.data;
    return {
      allowed: allowed === 1,
      retryAfterMs: retryAfterMs < 0 ? Number.POSITIVE_INFINITY : retryAfterMs,
      remaining: Number(tokens),
    };
  };
}
