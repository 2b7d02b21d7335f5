import { traceMiddleware } from '@/middleware/trace';
import { MockResponse, mockRequest } from '../support/http';

describe('traceMiddleware', () => {
  it('should reuse a well-formed incoming trace id', () => {
    const req = mockRequest({ headers: { 'X-Trace-Id': 'upstream-trace.42' } });
    const res = new MockResponse();
    const next = jest.fn();

    traceMiddleware(req, res.asResponse(), next);

    expect(req.trace_id).toBe('upstream-trace.42');
    expect(res.headers.get('x-trace-id')).toBe('upstream-trace.42');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should replace a malformed trace id with a fresh one', () => {
    const req = mockRequest({ headers: { 'X-Trace-Id': 'bad id\nwith newline' } });
    const res = new MockResponse();

    traceMiddleware(req, res.asResponse(), jest.fn());

    expect(req.trace_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(res.headers.get('x-trace-id')).toBe(req.trace_id);
  });

  it('should generate a trace id when none is sent', () => {
    const req = mockRequest();

    traceMiddleware(req, new MockResponse().asResponse(), jest.fn());

    expect(req.trace_id).not.toBe('trace-test');
    expect(req.trace_id).toHaveLength(36);
  });
});
