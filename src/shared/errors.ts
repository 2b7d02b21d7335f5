/**
 * Error taxonomy for the delivery pipeline.
 *
 * Throttling and transient external failures are recovered inside the worker;
 * only SchedulingError and NotFoundError are surfaced to callers.
 */

export class SchedulingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulingError';
  }
}

export class ThrottledError extends Error {
  constructor(
    readonly resource: string,
    readonly retryAfterMs: number
  ) {
    super(`Rate limit reached for ${resource}`);
    this.name = 'ThrottledError';
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class SendError extends Error {
  /**
   * false for client errors the gateway will never accept (e.g. 4xx)
   */
  readonly shouldRetry: boolean;

  constructor(message: string, shouldRetry = true, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SendError';
    this.shouldRetry = shouldRetry;
  }
}

export class TimezoneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimezoneError';
  }
}

export class UnknownTimezoneError extends TimezoneError {
  constructor(readonly timezone: string) {
    super(`Invalid timezone: ${timezone}`);
    this.name = 'UnknownTimezoneError';
  }
}

export class InvalidWindowError extends TimezoneError {
  constructor(
    readonly startHour: number,
    readonly endHour: number
  ) {
    super(`Invalid delivery window: ${startHour}..${endHour}`);
    this.name = 'InvalidWindowError';
  }
}

export class TerminalFailure extends Error {
  constructor(
    readonly deliveryId: string,
    readonly attempts: number,
    readonly lastError: string
  ) {
    super(`Delivery ${deliveryId} failed permanently after ${attempts} attempt(s): ${lastError}`);
    this.name = 'TerminalFailure';
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class RateLimitConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RateLimitConfigError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
