import pino from 'pino';
import { config } from 'dotenv';

config();

const isDevelopment = process.env.NODE_ENV === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: label => {
      return { level: label };
    },
  },
  base: {
    pid: process.pid,
    environment: process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = typeof logger;

/**
 * Request-scoped logger; every line carries the trace id
 */
export const createLoggerWithTrace = (trace_id: string): Logger => {
  return logger.child({ trace_id });
};

export const newTraceId = (prefix: string): string => `${prefix}-${Date.now()}`;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Error with its stack. `context` keys are merged into the log line.
 */
export function logError(trace_id: string, error: Error, context?: Record<string, unknown>) {
  logger.error(
    {
      trace_id,
      error: error.message,
      errorName: error.name,
      stack: error.stack,
      ...context,
    },
    'Error occurred'
  );
}

/**
 * Outbound call to the generation API or the SMS gateway. Bodies may hold phone
 * numbers and message text, so callers pass them only when they are safe to keep.
 */
export function logExternalRequest(trace_id: string, method: string, url: string, body?: unknown) {
  logger.info(
    {
      trace_id,
      method,
      url,
      body,
      type: 'external_http_request',
    },
    'External API request'
  );
}

export function logExternalResponse(
  trace_id: string,
  method: string,
  url: string,
  status: number,
  duration: number,
  body?: unknown
) {
  logger.info(
    {
      trace_id,
      method,
      url,
      status,
      duration,
      body,
      type: 'external_http_response',
    },
    'External API response'
  );
}

/**
 * State changes worth auditing: scheduling, sends, terminal failures
 */
export function logCriticalOperation(
  trace_id: string,
  operation: string,
  data?: Record<string, unknown>
) {
  logger.info(
    {
      trace_id,
      operation,
      ...data,
      type: 'critical_operation',
    },
    `Critical operation: ${operation}`
  );
}
