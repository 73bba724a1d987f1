import { FailurePolicy, FormatKind, ScriptSummary, SegmentReceipt, Turn, TurnGap, TurnState, VoiceIdentity } from '../domain/types';

export type SettledTurnState = Extract<TurnState, 'done' | 'failed' | 'skipped'>;

export interface TurnProgressEvent {
  turnIndex: number;
  totalTurns: number;
  speaker: string;
  leadingTag?: string;
  state: SettledTurnState;
}

export interface PipelineRequest {
  script: string;
  format: FormatKind;
  /** Speaker label to voice id; layered over configured overrides. */
  overrides?: Record<string, string>;
  failurePolicy?: FailurePolicy;
  concurrency?: number;
  signal?: AbortSignal;
  onTurnSettled?: (event: TurnProgressEvent) => void;
}

export interface PipelineResult {
  audio: Buffer;
  outputFormat: string;
  turns: readonly Turn[];
  segments: SegmentReceipt[];
  gaps: TurnGap[];
  states: TurnState[];
}

export interface AnnotatedTurn {
  turn: Turn;
  voice?: VoiceIdentity;
  problem?: string;
}

export interface PipelinePreview {
  format: FormatKind;
  turns: AnnotatedTurn[];
  summary: ScriptSummary;
  unresolvedSpeakers: string[];
}
