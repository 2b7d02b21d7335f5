import { Response } from 'express';
import { ApiResponse } from '@/shared/types';

/**
 * Success envelope. `trace_id` matches the X-Trace-Id header and the request's log lines.
 */
export const jsonOk = <T>(res: Response, trace_id: string, message: string, data: T, code = 200): void => {
  const body: ApiResponse<T> = { success: true, message, data, trace_id };
  res.status(code).json(body);
};

export const jsonError = (res: Response, trace_id: string, error: string, code: number): void => {
  const body: ApiResponse = { success: false, error, trace_id };
  res.status(code).json(body);
};
