import { Test } from '@nestjs/testing';
import { FakeTtsProvider, httpError, noWait } from '../../test/helpers/fake-tts.provider';
import { Turn, VoiceIdentity } from '../domain/types';
import { GenerationAbortedError, GenerationError, SynthesisTimeoutError } from './generation.errors';
import { createRetryPolicy, RetryPolicyOptions } from './retry-policy';
import { SegmentGeneratorOptions, SegmentGeneratorService } from './segment-generator.service';
import { SEGMENT_GENERATOR_OPTIONS, TTS_PROVIDER_TOKEN } from './tts.constants';

const VOICE: VoiceIdentity = { voiceId: 'voice-host', model: 'test-model', outputFormat: 'mp3_44100_128' };

function turn(text: string, index = 0, speaker = 'HOST'): Turn {
  return { index, speaker, text, lineNumber: index + 1 };
}

describe('SegmentGeneratorService', () => {
  let provider: FakeTtsProvider;
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;

  async function createGenerator(
    retry: Partial<RetryPolicyOptions> = {},
    overrides: Partial<SegmentGeneratorOptions> = {},
  ): Promise<SegmentGeneratorService> {
    const options: SegmentGeneratorOptions = {
      retryPolicy: createRetryPolicy({ baseDelayMs: 100, sleep, ...retry }),
      chunkCharLimit: 4000,
      historySize: 3,
      ...overrides,
    };
    const moduleRef = await Test.createTestingModule({
      providers: [
        SegmentGeneratorService,
        { provide: TTS_PROVIDER_TOKEN, useValue: provider },
        { provide: SEGMENT_GENERATOR_OPTIONS, useValue: options },
      ],
    }).compile();
    return moduleRef.get(SegmentGeneratorService);
  }

  beforeEach(() => {
    provider = new FakeTtsProvider();
    sleep = jest.fn((_ms: number, _signal?: AbortSignal) => noWait());
  });

  it('passes the turn text through with its tags untouched', async () => {
    const generator = await createGenerator();
    const text = 'I was thinking [sigh] maybe [long pause] we should [whispers] try it.';

    await generator.generate(turn(text), VOICE, []);

    expect(provider.calls[0].text).toBe(text);
    expect(provider.calls[0].voiceId).toBe('voice-host');
  });

  it('returns a segment carrying the new generation id', async () => {
    const generator = await createGenerator();

    const segment = await generator.generate(turn('[excited] Hi!', 2), VOICE, []);

    expect(segment.turnIndex).toBe(2);
    expect(segment.generationId).toBe('gen-1');
    expect(segment.generationIds).toEqual(['gen-1']);
    expect(segment.audio.toString()).toBe('[excited] Hi!|');
    expect(segment.attempts).toBe(1);
    expect(segment.voice).toBe(VOICE);
  });

  it('sends at most the last history entries as continuity hints', async () => {
    const generator = await createGenerator();

    await generator.generate(turn('Hello.'), VOICE, ['a', 'b', 'c', 'd']);

    expect(provider.calls[0].previousRequestIds).toEqual(['b', 'c', 'd']);
  });

  it('forwards adjacent text context', async () => {
    const generator = await createGenerator();

    await generator.generate(turn('Hello.'), VOICE, [], { context: { previousText: 'before', nextText: 'after' } });

    expect(provider.calls[0].previousText).toBe('before');
    expect(provider.calls[0].nextText).toBe('after');
  });

  it('retries transient failures with backoff', async () => {
    provider.failNext(httpError(503));
    const generator = await createGenerator();

    const segment = await generator.generate(turn('Hello.'), VOICE, []);

    expect(provider.calls).toHaveLength(2);
    expect(segment.attempts).toBe(2);
    expect(segment.generationId).toBe('gen-2');
    expect(sleep).toHaveBeenCalledWith(100, undefined);
  });

  it('does not retry permanent failures', async () => {
    provider.failNext(httpError(401));
    const generator = await createGenerator();

    const failure = await generator.generate(turn('Hello.', 4), VOICE, []).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(GenerationError);
    expect(failure).toMatchObject({ kind: 'permanent', turnIndex: 4, speaker: 'HOST', attempts: 1, exhausted: false });
    expect(provider.calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('escalates exhausted transient failures to permanent', async () => {
    provider.failNext(httpError(429), httpError(429), httpError(429));
    const generator = await createGenerator();

    const failure = await generator.generate(turn('Hello.'), VOICE, []).catch((error: unknown) => error);

    expect(failure).toMatchObject({ kind: 'permanent', attempts: 3, exhausted: true });
    expect(provider.calls).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('times out a hung call and classifies it as transient', async () => {
    provider.respondWith(
      (request) =>
        new Promise((_, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('canceled')));
        }),
    );
    const generator = await createGenerator({ timeoutMs: 20, maxAttempts: 2 });

    const failure = await generator.generate(turn('Hello.'), VOICE, []).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(GenerationError);
    expect(failure).toMatchObject({ kind: 'permanent', attempts: 2, exhausted: true });
    expect(failure instanceof GenerationError && failure.cause).toBeInstanceOf(SynthesisTimeoutError);
  });

  it('makes no call once the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = await createGenerator();

    await expect(generator.generate(turn('Hello.', 1), VOICE, [], { signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationAbortedError,
    );
    expect(provider.calls).toHaveLength(0);
  });

  it('splits long turns and rolls chunk ids into the hints', async () => {
    const generator = await createGenerator({}, { chunkCharLimit: 20 });

    const segment = await generator.generate(
      turn('First one here. Second one here. Third.'),
      VOICE,
      ['h0'],
      { context: { previousText: 'before', nextText: 'after' } },
    );

    expect(provider.calls.map((call) => call.text)).toEqual(['First one here.', 'Second one here.', 'Third.']);
    expect(provider.calls.map((call) => call.previousRequestIds)).toEqual([
      ['h0'],
      ['h0', 'gen-1'],
      ['h0', 'gen-1', 'gen-2'],
    ]);
    expect(provider.calls.map((call) => [call.previousText, call.nextText])).toEqual([
      ['before', 'Second one here.'],
      ['First one here.', 'Third.'],
      ['Second one here.', 'after'],
    ]);
    expect(segment.audio.toString()).toBe('First one here.|Second one here.|Third.|');
    expect(segment.generationIds).toEqual(['gen-1', 'gen-2', 'gen-3']);
    expect(segment.generationId).toBe('gen-3');
    expect(segment.attempts).toBe(3);
  });
});
