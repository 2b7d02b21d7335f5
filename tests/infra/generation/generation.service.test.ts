import { GenerationService } from '@/infra/generation/generation.service';
import { GenerationError } from '@/shared/errors';
import { fingerprintContent } from '@/shared/utils';

describe('GenerationService', () => {
  const url = 'http://generator.test/generate';
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;
  let service: GenerationService;

  const respond = (status: number, body: unknown) =>
    fetchSpy.mockImplementationOnce(async () => new Response(JSON.stringify(body), { status }));

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    service = new GenerationService({ url, apiKey: 'test-secret', timeoutMs: 1000 });
  });

  afterEach(() => {
    service.shutdown();
    fetchSpy.mockRestore();
  });

  it('should request content that avoids recent messages and fingerprint the reply', async () => {
    respond(200, { content: '  Have a bright afternoon!  ' });

    const message = await service.generateMessage('sub-1', ['fp-1', 'fp-2']);

    expect(message).toEqual({
      content: 'Have a bright afternoon!',
      fingerprint: fingerprintContent('Have a bright afternoon!'),
    });
    const [target, init] = fetchSpy.mock.calls[0];
    expect(target).toBe(url);
    expect(init?.body).toBe(JSON.stringify({ subscriberId: 'sub-1', avoidFingerprints: ['fp-1', 'fp-2'] }));
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
  });

  it('should make a single call even when the reply repeats a recent message', async () => {
    const repeated = 'Same as yesterday';
    respond(200, { content: repeated });

    const message = await service.generateMessage('sub-1', [fingerprintContent(repeated)]);

    expect(message.content).toBe(repeated);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should raise GenerationError for an error status', async () => {
    respond(500, { error: 'model crashed' });

    const generation = service.generateMessage('sub-1', []);

    await expect(generation).rejects.toThrow(GenerationError);
    await expect(generation).rejects.toThrow('Generation API error 500');
  });

  it('should raise GenerationError for blank content', async () => {
    respond(200, { content: '   ' });

    await expect(service.generateMessage('sub-1', [])).rejects.toThrow(
      new GenerationError('Generation API returned no content')
    );
  });

  it('should stop calling the API once the breaker opens', async () => {
    respond(503, { error: 'overloaded' });

    await expect(service.generateMessage('sub-1', [])).rejects.toThrow('Generation API error 503');
    await expect(service.generateMessage('sub-1', [])).rejects.toThrow('Generation API unavailable: Breaker is open');

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(service.getStats()).toMatchObject({ status: 'open', failures: 1 });
  });
});
