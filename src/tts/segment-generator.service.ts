import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/describe-error';
import { AdjacentText, Segment, Turn, VoiceIdentity } from '../domain/types';
import { GenerationAbortedError, GenerationError, GenerationErrorContext, SynthesisTimeoutError } from './generation.errors';
import { MAX_HISTORY_SIZE } from '../continuity/continuity-ledger';
import { RetryPolicy } from './retry-policy';
import { headOf, splitIntoChunks, tailOf } from './text-chunks';
import { SEGMENT_GENERATOR_OPTIONS, TTS_PROVIDER_TOKEN } from './tts.constants';
import { SynthesisRequest, SynthesisResult, TtsProvider } from './tts.interfaces';

export interface SegmentGeneratorOptions {
  retryPolicy: RetryPolicy;
  chunkCharLimit: number;
  historySize: number;
}

export interface GenerateOptions {
  context?: AdjacentText;
  /** Run-level cancellation. Checked before each attempt; never forwarded to an in-flight call. */
  signal?: AbortSignal;
}

interface AttemptOutcome {
  result: SynthesisResult;
  attempts: number;
}

/**
 * Produces one Segment per turn. Reads continuity history but never records
 * it; the caller owns the ledger.
 */
@Injectable()
export class SegmentGeneratorService {
  private readonly logger = new Logger(SegmentGeneratorService.name);

  constructor(
    @Inject(TTS_PROVIDER_TOKEN) private readonly provider: TtsProvider,
    @Inject(SEGMENT_GENERATOR_OPTIONS) private readonly options: SegmentGeneratorOptions,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  get historySize(): number {
    return Math.min(this.options.historySize, MAX_HISTORY_SIZE);
  }

  async generate(
    turn: Turn,
    voice: VoiceIdentity,
    history: readonly string[],
    options: GenerateOptions = {},
  ): Promise<Segment> {
    const chunks = splitIntoChunks(turn.text, this.options.chunkCharLimit);
    const context = options.context ?? {};
    const audio: Buffer[] = [];
    const generationIds: string[] = [];
    let hints = history.slice(-this.historySize);
    let attempts = 0;

    if (chunks.length > 1) {
      this.logger.log(`Turn ${turn.index + 1} (${turn.speaker}) split into ${chunks.length} chunks`);
    }

    for (let i = 0; i < chunks.length; i += 1) {
      const request: SynthesisRequest = {
        text: chunks[i],
        voiceId: voice.voiceId,
        model: voice.model,
        outputFormat: voice.outputFormat,
        previousRequestIds: hints,
        previousText: i > 0 ? tailOf(chunks[i - 1]) : context.previousText,
        nextText: i < chunks.length - 1 ? headOf(chunks[i + 1]) : context.nextText,
      };
      const outcome = await this.synthesizeWithRetry(turn, voice, request, attempts, options.signal);
      attempts = outcome.attempts;
      audio.push(outcome.result.audio);
      const generationId = outcome.result.generationId;
      if (generationId) {
        generationIds.push(generationId);
        hints = [...hints, generationId].slice(-this.historySize);
      }
    }

    return Object.freeze({
      turnIndex: turn.index,
      speaker: turn.speaker,
      voice,
      audio: audio.length === 1 ? audio[0] : Buffer.concat(audio),
      generationId: generationIds.at(-1),
      generationIds: Object.freeze(generationIds),
      attempts,
    });
  }

  private async synthesizeWithRetry(
    turn: Turn,
    voice: VoiceIdentity,
    request: SynthesisRequest,
    attemptsSoFar: number,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    const policy = this.options.retryPolicy;
    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) {
        throw new GenerationAbortedError(turn.index);
      }
      try {
        const result = await this.callWithTimeout(request, policy.timeoutMs);
        return { result, attempts: attemptsSoFar + attempt };
      } catch (error) {
        const context: GenerationErrorContext = {
          turnIndex: turn.index,
          speaker: turn.speaker,
          voiceId: voice.voiceId,
          attempts: attemptsSoFar + attempt,
        };
        if (policy.classify(error) === 'permanent') {
          throw new GenerationError('permanent', context, error);
        }
        if (attempt >= policy.maxAttempts) {
          throw new GenerationError('permanent', { ...context, exhausted: true }, error);
        }
        const delay = policy.delayFor(attempt);
        this.logger.warn(
          `Turn ${turn.index + 1} (${turn.speaker}) attempt ${attempt}/${policy.maxAttempts} failed: ${describeError(error)}; retrying in ${delay}ms`,
        );
        await policy.sleep(delay, signal);
      }
    }
  }

  private async callWithTimeout(request: SynthesisRequest, timeoutMs: number): Promise<SynthesisResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new SynthesisTimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.provider.synthesize({ ...request, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
