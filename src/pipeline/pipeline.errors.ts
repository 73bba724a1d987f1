import { TurnGap } from '../domain/types';

export class RunCancelledError extends Error {
  constructor(
    public readonly completedTurns: number,
    public readonly totalTurns: number,
  ) {
    super(`Run cancelled after ${completedTurns} of ${totalTurns} turns; no audio was produced`);
    this.name = 'RunCancelledError';
  }
}

export class NoAudioProducedError extends Error {
  constructor(public readonly gaps: TurnGap[]) {
    super(`Every turn failed (${gaps.length} gap(s)); nothing to join`);
    this.name = 'NoAudioProducedError';
  }
}
