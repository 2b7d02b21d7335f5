import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { errorMessage, logger, newTraceId } from '@/config/logger';
import { HttpStatusError, postJson } from '@/infra/http/post-json';
import { GenerationError } from '@/shared/errors';
import { BreakerGuarded, BreakerStats, GeneratedMessage, MessageGenerator } from '@/shared/types';
import { fingerprintContent } from '@/shared/utils';

const generationResponseSchema = z.object({
  content: z.string().trim().min(1),
});

export interface GenerationServiceOptions {
  url: string;
  apiKey?: string;
  timeoutMs: number;
  resetTimeoutMs?: number;
}

export class GenerationService implements MessageGenerator, BreakerGuarded {
  private circuitBreaker: CircuitBreaker<[string, string[], string], string>;

  constructor(private readonly options: GenerationServiceOptions) {
    this.circuitBreaker = new CircuitBreaker(
      async (subscriberId: string, avoid: string[], trace_id: string) => {
        return await this.requestContent(subscriberId, avoid, trace_id);
      },
      {
        timeout: options.timeoutMs,
        errorThresholdPercentage: 50,
        resetTimeout: options.resetTimeoutMs ?? 30000,
      }
    );

    this.circuitBreaker.on('open', () => {
      logger.error({ service: 'GenerationService' }, 'Circuit breaker opened - generation API unavailable');
    });

    this.circuitBreaker.on('close', () => {
      logger.info({ service: 'GenerationService' }, 'Circuit breaker closed - generation API recovered');
    });
  }

  /**
   * One API call per invocation. The caller holds a single generation token for it.
   */
  generateMessage = async (subscriberId: string, recentFingerprints: string[]): Promise<GeneratedMessage> => {
    const trace_id = newTraceId('generate');

    let content: string;
    try {
      content = await this.circuitBreaker.fire(subscriberId, recentFingerprints, trace_id);
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(`Generation API unavailable: ${errorMessage(error)}`, { cause: error });
    }

    const fingerprint = fingerprintContent(content);
    if (recentFingerprints.includes(fingerprint)) {
      logger.warn({ trace_id, subscriberId, fingerprint }, 'Generated message repeats a recent one');
    }
    return { content, fingerprint };
  };

  getStats = (): BreakerStats => {
    const { failures, rejects, timeouts } = this.circuitBreaker.stats;
    return { status: this.circuitBreaker.opened ? 'open' : 'closed', failures, rejects, timeouts };
  };

  shutdown = (): void => {
    this.circuitBreaker.shutdown();
  };

  private requestContent = async (subscriberId: string, avoid: string[], trace_id: string): Promise<string> => {
    let body: unknown;
    try {
      body = await postJson(
        this.options.url,
        { subscriberId, avoidFingerprints: avoid },
        {
          timeoutMs: this.options.timeoutMs,
          headers: this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : undefined,
          trace_id,
        }
      );
    } catch (error) {
      if (error instanceof HttpStatusError) {
        throw new GenerationError(`Generation API error ${error.status}`, { cause: error });
      }
      throw new GenerationError(`Generation request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = generationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationError('Generation API returned no content');
    }
    return parsed.data.content;
  };
}
