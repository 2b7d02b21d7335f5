import { AcquireResult, BucketConfig, BucketState, BucketStore } from './rate-limit.types';
import { refillAndTake } from './token-bucket';

export interface LocalBucketStoreOptions {
  /**
   * How often refilled buckets are dropped; a dropped bucket comes back full
   */
  sweepIntervalMs?: number;
}

interface Bucket {
  state: BucketState;
  config: BucketConfig;
}

const isRefilled = ({ state, config }: Bucket, nowMs: number): boolean =>
  config.refillPerSecond > 0 &&
  state.tokens + (Math.max(0, nowMs - state.updatedAt) * config.refillPerSecond) / 1000 >= config.capacity;

/**
 * Process-local buckets. The read, refill and write happen without yielding
 * to the event loop, so concurrent callers in this process cannot interleave.
 *
 * State is not shared between processes: N worker processes each get the full
 * quota, and the aggregate rate can reach N times the configured limit.
 */
export class LocalBucketStore implements BucketStore {
  readonly mode = 'memory' as const;
  private buckets = new Map<string, Bucket>();
  private readonly sweepIntervalMs: number;
  private nextSweepAt: number | undefined;

  constructor(options: LocalBucketStoreOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60000;
  }

  get size(): number {
    return this.buckets.size;
  }

  take = async (resource: string, config: BucketConfig, cost: number, nowMs: number): Promise<AcquireResult> => {
    this.sweep(nowMs);
    const { state, result } = refillAndTake(this.buckets.get(resource)?.state, config, cost, nowMs);
    this.buckets.set(resource, { state, config });
    return result;
  };

  peek = (resource: string): BucketState | undefined => {
    const bucket = this.buckets.get(resource);
    return bucket ? { ...bucket.state } : undefined;
  };

  // Same effect as the key expiry of the Redis store: keyed buckets (one per client IP) do not pile up
  private sweep = (nowMs: number): void => {
    if (this.nextSweepAt !== undefined && nowMs < this.nextSweepAt) {
      return;
    }
    this.nextSweepAt = nowMs + this.sweepIntervalMs;
    for (const [resource, bucket] of this.buckets) {
      if (isRefilled(bucket, nowMs)) {
        this.buckets.delete(resource);
      }
    }
  };
}
