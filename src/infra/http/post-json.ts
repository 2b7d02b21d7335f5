import { logExternalRequest, logExternalResponse } from '@/config/logger';
import { TimeoutError } from '@/shared/errors';

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${url} responded with status ${status}: ${body}`);
    this.name = 'HttpStatusError';
  }

  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

export interface PostJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  trace_id?: string;
}

const parseBody = (text: string): unknown => {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/**
 * POST a JSON body and return the parsed response. Non-2xx responses reject with HttpStatusError.
 * Request bodies are not logged; they carry phone numbers and message content.
 */
export const postJson = async (url: string, body: unknown, options: PostJsonOptions): Promise<unknown> => {
  const trace_id = options.trace_id ?? 'unknown';
  const startTime = Date.now();

  logExternalRequest(trace_id, 'POST', url);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    const text = await response.text();
    logExternalResponse(trace_id, 'POST', url, response.status, Date.now() - startTime);

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, text);
    }

    return parseBody(text);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logExternalResponse(trace_id, 'POST', url, 0, Date.now() - startTime, { error: 'timeout' });
      throw new TimeoutError(`POST ${url}`, options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
};
