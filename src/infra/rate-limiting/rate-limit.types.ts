export interface BucketConfig {
  capacity: number;
  refillPerSecond: number;
}

export interface BucketState {
  tokens: number;
  updatedAt: number; // epoch ms of the last refill
}

export interface AcquireResult {
  allowed: boolean;
  /**
   * Time until enough tokens accrue; 0 when allowed, Infinity when the bucket never refills
   */
  retryAfterMs: number;
  remaining: number;
}

export type RateLimitStoreMode = 'memory' | 'redis';

/**
 * Backing state for token buckets. `take` must refill and debit as one atomic step.
 */
export interface BucketStore {
  readonly mode: RateLimitStoreMode;
  take(resource: string, config: BucketConfig, cost: number, nowMs: number): Promise<AcquireResult>;
}
