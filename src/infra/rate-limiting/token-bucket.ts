import { AcquireResult, BucketConfig, BucketState } from './rate-limit.types';

/**
 * Milliseconds until `missing` tokens accrue at the configured rate
 */
export const retryAfterFor = (missing: number, refillPerSecond: number): number =>
  refillPerSecond > 0 ? Math.ceil((missing * 1000) / refillPerSecond) : Number.POSITIVE_INFINITY;

/**
 * Refill a bucket for the elapsed time and try to debit `cost` tokens.
 * A bucket seen for the first time starts full. A clock that moves backwards
 * adds nothing and does not rewind updatedAt.
 */
export const refillAndTake = (
  previous: BucketState | undefined,
  config: BucketConfig,
  cost: number,
  nowMs: number
): { state: BucketState; result: AcquireResult } => {
  const start = previous ?? { tokens: config.capacity, updatedAt: nowMs };
  const elapsedMs = Math.max(0, nowMs - start.updatedAt);
  const tokens = Math.min(config.capacity, start.tokens + (elapsedMs * config.refillPerSecond) / 1000);
  const updatedAt = Math.max(nowMs, start.updatedAt);

  if (tokens >= cost) {
    const remaining = tokens - cost;
    return {
      state: { tokens: remaining, updatedAt },
      result: { allowed: true, retryAfterMs: 0, remaining },
    };
  }

  return {
    state: { tokens, updatedAt },
    result: { allowed: false, retryAfterMs: retryAfterFor(cost - tokens, config.refillPerSecond), remaining: tokens },
  };
};
