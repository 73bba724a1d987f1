import { abortableSleep, classifySynthesisFailure, createRetryPolicy } from './retry-policy';
import { SynthesisTimeoutError } from './generation.errors';

describe('classifySynthesisFailure', () => {
  const withStatus = (status: number) => Object.assign(new Error('http'), { response: { status } });
  const withCode = (code: string) => Object.assign(new Error('net'), { code });

  it.each([408, 409, 425, 429, 500, 502, 503])('treats HTTP %i as transient', (status) => {
    expect(classifySynthesisFailure(withStatus(status))).toBe('transient');
  });

  it.each([400, 401, 403, 404, 422])('treats HTTP %i as permanent', (status) => {
    expect(classifySynthesisFailure(withStatus(status))).toBe('permanent');
  });

  it('reads status from SDK errors', () => {
    expect(classifySynthesisFailure(Object.assign(new Error('rate'), { status: 429 }))).toBe('transient');
  });

  it('treats socket error codes as transient', () => {
    expect(classifySynthesisFailure(withCode('ECONNRESET'))).toBe('transient');
    expect(classifySynthesisFailure(new Error('fetch failed', { cause: withCode('ETIMEDOUT') }))).toBe('transient');
  });

  it('treats its own timeout as transient', () => {
    expect(classifySynthesisFailure(new SynthesisTimeoutError(10))).toBe('transient');
  });

  it('treats connection errors from the openai SDK as transient by name', () => {
    const error = new Error('Connection error.');
    error.name = 'APIConnectionError';
    expect(classifySynthesisFailure(error)).toBe('transient');
  });

  it('treats configuration problems as permanent', () => {
    expect(classifySynthesisFailure(new Error('ELEVENLABS_API_KEY must be set for ElevenLabs TTS'))).toBe('permanent');
  });
});

describe('createRetryPolicy', () => {
  it('backs off exponentially up to the cap', () => {
    const policy = createRetryPolicy({ baseDelayMs: 100, maxDelayMs: 350, factor: 2 });

    expect([1, 2, 3, 4].map((attempt) => policy.delayFor(attempt))).toEqual([100, 200, 350, 350]);
  });

  it('uses three attempts by default', () => {
    expect(createRetryPolicy().maxAttempts).toBe(3);
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow('maxAttempts must be a positive integer, got 0');
  });
});

describe('abortableSleep', () => {
  it('resolves as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = abortableSleep(10_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
