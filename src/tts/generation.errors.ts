import { describeError } from '../common/describe-error';

export type FailureKind = 'transient' | 'permanent';

export interface GenerationErrorContext {
  turnIndex: number;
  speaker: string;
  voiceId: string;
  attempts: number;
  /** True when a transient failure was escalated because attempts ran out. */
  exhausted?: boolean;
}

export class GenerationError extends Error {
  readonly turnIndex: number;
  readonly speaker: string;
  readonly voiceId: string;
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(public readonly kind: FailureKind, context: GenerationErrorContext, cause: unknown) {
    const suffix = context.exhausted ? ' (retries exhausted)' : '';
    super(
      `Turn ${context.turnIndex + 1} (${context.speaker}) failed after ${context.attempts} attempt(s)${suffix}: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'GenerationError';
    this.turnIndex = context.turnIndex;
    this.speaker = context.speaker;
    this.voiceId = context.voiceId;
    this.attempts = context.attempts;
    this.exhausted = context.exhausted ?? false;
  }
}

export class SynthesisTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Synthesis call timed out after ${timeoutMs}ms`);
    this.name = 'SynthesisTimeoutError';
  }
}

export class GenerationAbortedError extends Error {
  constructor(public readonly turnIndex: number) {
    super(`Generation for turn ${turnIndex + 1} was abandoned because the run was cancelled`);
    this.name = 'GenerationAbortedError';
  }
}
