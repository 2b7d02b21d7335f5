import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { errorMessage, logger, newTraceId } from '@/config/logger';
import { HttpStatusError, postJson } from '@/infra/http/post-json';
import { SendError } from '@/shared/errors';
import { BreakerGuarded, BreakerStats, MessageSender } from '@/shared/types';

const sendResponseSchema = z.object({
  receiptId: z.string().min(1),
});

export interface SmsGatewayOptions {
  url: string;
  token?: string;
  timeoutMs: number;
  resetTimeoutMs?: number;
}

/**
 * HTTP client for the SMS gateway.
 *
 * 4xx responses reject with a non-retryable SendError and do not count against the breaker.
 */
export class SmsGatewayService implements MessageSender, BreakerGuarded {
  private circuitBreaker: CircuitBreaker<[string, string, string], string>;

  constructor(private readonly options: SmsGatewayOptions) {
    this.circuitBreaker = new CircuitBreaker(
      async (phoneNumber: string, content: string, trace_id: string) => {
        return await this.sendRequest(phoneNumber, content, trace_id);
      },
      {
        timeout: options.timeoutMs,
        errorThresholdPercentage: 50, // Open circuit if 50% of requests fail
        resetTimeout: options.resetTimeoutMs ?? 30000,
        errorFilter: (error: unknown) => error instanceof SendError && !error.shouldRetry,
      }
    );

    this.circuitBreaker.on('open', () => {
      logger.error({ service: 'SmsGatewayService' }, 'Circuit breaker opened - SMS gateway unavailable');
    });

    this.circuitBreaker.on('halfOpen', () => {
      logger.info({ service: 'SmsGatewayService' }, 'Circuit breaker half-open - testing SMS gateway');
    });

    this.circuitBreaker.on('close', () => {
      logger.info({ service: 'SmsGatewayService' }, 'Circuit breaker closed - SMS gateway recovered');
    });
  }

  send = async (phoneNumber: string, content: string): Promise<string> => {
    const trace_id = newTraceId('sms');
    try {
      return await this.circuitBreaker.fire(phoneNumber, content, trace_id);
    } catch (error) {
      if (error instanceof SendError) {
        throw error;
      }
      // Open breaker, breaker timeout
      throw new SendError(`SMS gateway unavailable: ${errorMessage(error)}`, true, { cause: error });
    }
  };

  getStats = (): BreakerStats => {
    const { failures, rejects, timeouts } = this.circuitBreaker.stats;
    return { status: this.circuitBreaker.opened ? 'open' : 'closed', failures, rejects, timeouts };
  };

  shutdown = (): void => {
    this.circuitBreaker.shutdown();
  };

  private sendRequest = async (phoneNumber: string, content: string, trace_id: string): Promise<string> => {
    let body: unknown;
    try {
      body = await postJson(
        this.options.url,
        { to: phoneNumber, body: content },
        {
          timeoutMs: this.options.timeoutMs,
          headers: this.options.token ? { Authorization: `Bearer ${this.options.token}` } : undefined,
          trace_id,
        }
      );
    } catch (error) {
      if (error instanceof HttpStatusError) {
        // Client errors are permanent; the gateway will never accept this message
        throw new SendError(
          `SMS gateway ${error.isClientError ? 'client' : 'server'} error ${error.status}`,
          !error.isClientError,
          { cause: error }
        );
      }
      throw new SendError(`SMS gateway request failed: ${errorMessage(error)}`, true, { cause: error });
    }

    const parsed = sendResponseSchema.safeParse(body);
    if (!parsed.success) {
      // Accepted but unreadable: resending could deliver twice
      throw new SendError('SMS gateway returned no receipt id', false);
    }
    return parsed.data.receiptId;
  };
}
