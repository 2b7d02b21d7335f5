import { config } from 'dotenv';
import { z } from 'zod';

config();

/**
 * Centralized configuration constants
 */

const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const rate = (fallback: number) => z.coerce.number().nonnegative().default(fallback);

const hourSchema = z.coerce.number().int().min(0).max(24);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: int(3000),
    TRUST_PROXY: z
      .enum(['true', 'false'])
      .default('false')
      .transform(value => value === 'true'),

    /**
     * Default local delivery window, used when a subscriber has none of their own.
     * Example: 12..17 = between noon and 5:00 PM in the subscriber's timezone
     */
    DELIVERY_WINDOW_START_HOUR: hourSchema.default(12),
    DELIVERY_WINDOW_END_HOUR: hourSchema.default(17),

    /**
     * Maximum number of attempts before a delivery is finalized as failed
     */
    MAX_RETRY_ATTEMPTS: positiveInt(5),

    /**
     * Exponential backoff delay in milliseconds (first retry)
     * Subsequent retries: 2s, 4s, 8s, 16s ... capped at RETRY_BACKOFF_MAX
     */
    RETRY_BACKOFF_DELAY: int(2000),
    RETRY_BACKOFF_MAX: int(300000),

    DELIVERY_TICK_CRON: z.string().default('* * * * *'),
    SCHEDULE_CRON: z.string().default('0 * * * *'),
    DELIVERY_BATCH_SIZE: positiveInt(100),
    DELIVERY_CONCURRENCY: positiveInt(5),
    CLAIM_TIMEOUT_MS: positiveInt(120000),

    GENERATION_TIMEOUT_MS: positiveInt(30000),
    SEND_TIMEOUT_MS: positiveInt(10000),
    STORE_TIMEOUT_MS: positiveInt(5000),

    HISTORY_LOOKUP_LIMIT: positiveInt(20),
    HISTORY_RETENTION_DAYS: positiveInt(7),

    RATE_LIMIT_STORE: z.enum(['redis', 'memory']).default('redis'),
    GENERATION_RATE_CAPACITY: positiveInt(100),
    GENERATION_RATE_PER_SECOND: rate(100 / 60),
    SMS_RATE_CAPACITY: positiveInt(5),
    SMS_RATE_PER_SECOND: rate(5),
    /**
     * Gateway account ceiling on top of the per-second rate: 2000 messages a day
     */
    SMS_DAILY_CAPACITY: positiveInt(2000),
    SMS_DAILY_PER_SECOND: rate(2000 / 86400),
    HTTP_STATUS_RATE_CAPACITY: positiveInt(50),
    HTTP_STATUS_RATE_PER_SECOND: rate(50 / 3600),

    GENERATION_API_URL: z.string().url().default('http://localhost:8080/generate'),
    GENERATION_API_KEY: z.string().optional(),
    SMS_GATEWAY_URL: z.string().url().default('http://localhost:8081/messages'),
    SMS_GATEWAY_TOKEN: z.string().optional(),
  })
  .refine(env => env.DELIVERY_WINDOW_START_HOUR < env.DELIVERY_WINDOW_END_HOUR, {
    message: 'DELIVERY_WINDOW_START_HOUR must be before DELIVERY_WINDOW_END_HOUR',
    path: ['DELIVERY_WINDOW_START_HOUR'],
  });

export type Settings = z.infer<typeof envSchema>;

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
};

export const settings = loadSettings();

/**
 * Rate-limited resources used by the delivery pipeline
 */
export const RESOURCE_GENERATION = 'generation';
export const RESOURCE_SMS = 'sms';
export const RESOURCE_SMS_DAILY = 'sms:daily';
export const RESOURCE_HTTP_STATUS = 'http:status';
