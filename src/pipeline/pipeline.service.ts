import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AUDIO_JOINER_TOKEN, AudioJoiner } from '../audio/audio-joiner';
import { describeError, errorMessage } from '../common/describe-error';
import { ContinuityLedger } from '../continuity/continuity-ledger';
import { FailurePolicy, Segment, Turn, TurnGap, TurnState, VoiceIdentity } from '../domain/types';
import { parseScript, summarizeScript } from '../script/script-parser';
import { GenerationAbortedError } from '../tts/generation.errors';
import { SegmentGeneratorService } from '../tts/segment-generator.service';
import { VoiceResolver } from '../voices/voice-resolver';
import { UnknownSpeakerError } from '../voices/voices.errors';
import { VoicesService } from '../voices/voices.service';
import { NoAudioProducedError, RunCancelledError } from './pipeline.errors';
import { AnnotatedTurn, PipelinePreview, PipelineRequest, PipelineResult, SettledTurnState } from './pipeline.types';
import { adjacentTextFor } from './turn-context';

interface TurnFailure {
  turnIndex: number;
  error: unknown;
}

interface RunState {
  turns: readonly Turn[];
  voices: (VoiceIdentity | undefined)[];
  states: TurnState[];
  segments: (Segment | undefined)[];
  gaps: TurnGap[];
  failures: TurnFailure[];
  ledger: ContinuityLedger;
  policy: FailurePolicy;
  controller: AbortController;
  request: PipelineRequest;
}

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly voicesService: VoicesService,
    private readonly segmentGenerator: SegmentGeneratorService,
    @Inject(AUDIO_JOINER_TOKEN) private readonly audioJoiner: AudioJoiner,
  ) {}

  /** Parses and resolves voices without calling the TTS provider. */
  preview(request: PipelineRequest): PipelinePreview {
    const turns = parseScript(request.script);
    const resolver = this.voicesService.createResolver(request.format, request.overrides);
    const policy = request.failurePolicy ?? 'fail-fast';
    const annotated: AnnotatedTurn[] = [];
    const unresolved = new Set<string>();

    for (const turn of turns) {
      try {
        annotated.push({ turn, voice: resolver.resolve(turn.speaker, turn.index) });
      } catch (error) {
        if (policy === 'fail-fast' || !(error instanceof UnknownSpeakerError)) {
          throw error;
        }
        unresolved.add(turn.speaker);
        annotated.push({ turn, problem: error.message });
      }
    }
    return {
      format: request.format,
      turns: annotated,
      summary: summarizeScript(turns),
      unresolvedSpeakers: [...unresolved].sort(),
    };
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const turns = parseScript(request.script);
    const policy = request.failurePolicy ?? 'fail-fast';
    const concurrency = this.resolveConcurrency(request.concurrency);
    const resolver = this.voicesService.createResolver(request.format, request.overrides);
    const state: RunState = {
      turns,
      voices: [],
      states: turns.map((): TurnState => 'pending'),
      segments: new Array<Segment | undefined>(turns.length),
      gaps: [],
      failures: [],
      ledger: new ContinuityLedger(this.segmentGenerator.historySize),
      policy,
      controller: new AbortController(),
      request,
    };
    state.voices = this.resolveVoices(state, resolver);

    this.logger.log(
      `Generating ${turns.length} turns (${request.format}, ${policy}, concurrency ${concurrency}) via ${this.segmentGenerator.providerName}`,
    );

    const onCancel = () => state.controller.abort();
    if (request.signal?.aborted) {
      state.controller.abort();
    }
    request.signal?.addEventListener('abort', onCancel, { once: true });
    try {
      let cursor = 0;
      const worker = async (): Promise<void> => {
        while (!state.controller.signal.aborted && cursor < turns.length) {
          const index = cursor;
          cursor += 1;
          if (state.voices[index]) {
            await this.processTurn(state, index);
          }
        }
      };
      await Promise.all(Array.from({ length: Math.min(concurrency, turns.length) }, () => worker()));
    } finally {
      request.signal?.removeEventListener('abort', onCancel);
    }

    const completed = state.segments.filter((segment): segment is Segment => Boolean(segment));
    if (policy === 'fail-fast' && state.failures.length) {
      const first = state.failures.reduce((earliest, failure) =>
        failure.turnIndex < earliest.turnIndex ? failure : earliest,
      );
      this.logger.error(
        `Run aborted at turn ${first.turnIndex + 1}; discarding ${completed.length} completed segment(s): ${describeError(first.error)}`,
      );
      throw first.error;
    }
    if (request.signal?.aborted) {
      throw new RunCancelledError(completed.length, turns.length);
    }
    const gaps = [...state.gaps].sort((a, b) => a.turnIndex - b.turnIndex);
    if (!completed.length) {
      throw new NoAudioProducedError(gaps);
    }

    const outputFormat = completed[0].voice.outputFormat;
    const audio = await this.audioJoiner.join(
      completed.map((segment) => segment.audio),
      outputFormat,
    );
    this.logger.log(
      `Joined ${completed.length}/${turns.length} segments with ${this.audioJoiner.name} (${audio.length} bytes, ${gaps.length} gap(s))`,
    );
    return {
      audio,
      outputFormat,
      turns,
      segments: completed.map((segment) => ({
        turnIndex: segment.turnIndex,
        speaker: segment.speaker,
        voiceId: segment.voice.voiceId,
        generationId: segment.generationId,
        bytes: segment.audio.length,
        attempts: segment.attempts,
      })),
      gaps,
      states: state.states,
    };
  }

  /**
   * Resolves every turn before any generation starts. Under fail-fast an
   * unknown speaker stops the run here; under best-effort its turns become gaps.
   */
  private resolveVoices(state: RunState, resolver: VoiceResolver): (VoiceIdentity | undefined)[] {
    return state.turns.map((turn) => {
      try {
        return resolver.resolve(turn.speaker, turn.index);
      } catch (error) {
        if (state.policy === 'fail-fast' || !(error instanceof UnknownSpeakerError)) {
          throw error;
        }
        this.logger.warn(`Skipping turn ${turn.index + 1}: ${error.message}`);
        state.gaps.push({ turnIndex: turn.index, speaker: turn.speaker, reason: error.message });
        this.settle(state, turn, 'skipped');
        return undefined;
      }
    });
  }

  private async processTurn(state: RunState, index: number): Promise<void> {
    const turn = state.turns[index];
    const voice = state.voices[index];
    if (!voice) {
      return;
    }
    state.states[index] = 'in_flight';
    const context = adjacentTextFor(state.turns, state.voices, index);

    try {
      const segment = await state.ledger.exclusive(voice, async () => {
        const history = state.ledger.historyFor(voice);
        const generated = await this.segmentGenerator.generate(turn, voice, history, {
          context,
          signal: state.controller.signal,
        });
        for (const generationId of generated.generationIds) {
          state.ledger.record(voice, generationId);
        }
        return generated;
      });
      state.segments[index] = segment;
      this.settle(state, turn, 'done');
    } catch (error) {
      if (error instanceof GenerationAbortedError) {
        state.states[index] = 'pending';
        return;
      }
      state.failures.push({ turnIndex: index, error });
      if (state.policy === 'fail-fast') {
        state.controller.abort();
      } else {
        this.logger.warn(`Skipping turn ${index + 1} (${turn.speaker}): ${errorMessage(error)}`);
        state.gaps.push({ turnIndex: index, speaker: turn.speaker, reason: errorMessage(error) });
      }
      this.settle(state, turn, 'failed');
    }
  }

  private settle(state: RunState, turn: Turn, outcome: SettledTurnState): void {
    state.states[turn.index] = outcome;
    state.request.onTurnSettled?.({
      turnIndex: turn.index,
      totalTurns: state.turns.length,
      speaker: turn.speaker,
      leadingTag: turn.leadingTag,
      state: outcome,
    });
  }

  private resolveConcurrency(requested?: number): number {
    const concurrency = requested ?? this.configService.get<number>('TTS_CONCURRENCY') ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    return concurrency;
  }
}
