import { createHash } from 'crypto';
import { TimeoutError } from './errors';

/**
 * Generate idempotency key for a delivery
 * @param subscriberId Subscriber ID
 * @param messageType Type of message (e.g., 'daily')
 * @param day Subscriber-local calendar day, yyyy-MM-dd
 * @returns Idempotency key string
 */
export const generateIdempotencyKey = (subscriberId: string, messageType: string, day: string): string => {
  return `${subscriberId}:${messageType}:${day}`;
};

/**
 * Stable fingerprint of message content, insensitive to case and spacing
 */
export const fingerprintContent = (content: string): string => {
  const normalized = content.trim().toLowerCase().replace(/\s+/g, ' ');
  return createHash('sha256').update(normalized).digest('hex');
};

/**
 * Reject with TimeoutError if the promise does not settle within timeoutMs.
 * The underlying operation is not cancelled.
 */
export const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Run worker over items with at most `concurrency` in flight
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> => {
  const results: R[] = new Array(items.length);
  let next = 0;

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index]);
    }
  });

  await Promise.all(lanes);
  return results;
};
