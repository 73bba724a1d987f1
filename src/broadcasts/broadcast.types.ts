import { FailurePolicy, FormatKind, ScriptLength, ScriptSummary, TurnGap } from '../domain/types';
import { PipelinePreview, TurnProgressEvent } from '../pipeline/pipeline.types';

export type BroadcastStage = 'init' | 'research' | 'script' | 'parse' | 'dry_run' | 'synthesize' | 'measure' | 'store';

export interface BroadcastRequest {
  topic: string;
  format: FormatKind;
  length?: ScriptLength;
  /** Pre-written script; skips research and script generation. */
  script?: string;
  skipResearch?: boolean;
  dryRun?: boolean;
  outputPrefix?: string;
  overrides?: Record<string, string>;
  failurePolicy?: FailurePolicy;
  concurrency?: number;
  signal?: AbortSignal;
  onStage?: (stage: BroadcastStage) => void;
  onTurnSettled?: (event: TurnProgressEvent) => void;
}

export interface BroadcastResult {
  prefix: string;
  scriptKey: string;
  researchKey?: string;
  audioKey?: string;
  audioUrl?: string;
  summary: ScriptSummary;
  preview: PipelinePreview;
  gaps: TurnGap[];
  durationSeconds?: number;
  dryRun: boolean;
}
