import { TimeoutError } from '@/shared/errors';
import { fingerprintContent, generateIdempotencyKey, mapWithConcurrency, withTimeout } from '@/shared/utils';

describe('generateIdempotencyKey', () => {
  it('should join subscriber, message type and day', () => {
    expect(generateIdempotencyKey('sub-1', 'daily', '2024-03-09')).toBe('sub-1:daily:2024-03-09');
  });
});

describe('fingerprintContent', () => {
  it('should ignore case and spacing differences', () => {
    expect(fingerprintContent('  Good  morning,\nSam ')).toBe(fingerprintContent('good morning, sam'));
  });

  it('should tell different messages apart', () => {
    expect(fingerprintContent('Good morning, Sam')).not.toBe(fingerprintContent('Good evening, Sam'));
  });

  it('should produce a sha256 hex digest', () => {
    expect(fingerprintContent('hello')).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });
});

describe('withTimeout', () => {
  it('should resolve with the value of a prompt operation', async () => {
    await expect(withTimeout(Promise.resolve('receipt-1'), 50, 'send message')).resolves.toBe('receipt-1');
  });

  it('should pass through the rejection of a prompt operation', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 50, 'send message')).rejects.toThrow('refused');
  });

  it('should reject with TimeoutError when the operation hangs', async () => {
    const pending = withTimeout(new Promise<string>(() => undefined), 10, 'claim delivery');

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('claim delivery timed out after 10ms');
  });
});

describe('mapWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await mapWithConcurrency(delays, 2, async delay => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return delay * 2;
    });

    expect(results).toEqual([60, 10, 30, 0]);
  });

  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setImmediate(resolve));
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
