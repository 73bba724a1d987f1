export type FormatKind = 'news' | 'podcast' | 'debate' | 'narrative';

export const FORMAT_KINDS: readonly FormatKind[] = ['news', 'podcast', 'debate', 'narrative'];

export type ScriptLength = 'short' | 'medium' | 'long';

export const SCRIPT_LENGTHS: readonly ScriptLength[] = ['short', 'medium', 'long'];

export type FailurePolicy = 'fail-fast' | 'best-effort';

/**
 * One speaker utterance. `text` keeps every inline `[tag]` exactly as written
 * in the script line; only surrounding whitespace is trimmed.
 */
export interface Turn {
  readonly index: number;
  readonly speaker: string;
  readonly text: string;
  readonly lineNumber: number;
  readonly leadingTag?: string;
}

export interface VoiceIdentity {
  readonly voiceId: string;
  readonly model: string;
  readonly outputFormat: string;
}

export interface Segment {
  readonly turnIndex: number;
  readonly speaker: string;
  readonly voice: VoiceIdentity;
  readonly audio: Buffer;
  /** Identifier of the last chunk synthesized for this turn. */
  readonly generationId?: string;
  readonly generationIds: readonly string[];
  readonly attempts: number;
}

export interface AdjacentText {
  previousText?: string;
  nextText?: string;
}

export type TurnState = 'pending' | 'in_flight' | 'done' | 'failed' | 'skipped';

export interface TurnGap {
  turnIndex: number;
  speaker: string;
  reason: string;
}

export interface SegmentReceipt {
  turnIndex: number;
  speaker: string;
  voiceId: string;
  generationId?: string;
  bytes: number;
  attempts: number;
}

export interface ScriptSummary {
  turnCount: number;
  wordCount: number;
  speakers: string[];
}
