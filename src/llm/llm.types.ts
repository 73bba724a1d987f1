import { FormatKind, ScriptLength } from '../domain/types';

export const LENGTH_WORD_TARGETS: Record<ScriptLength, number> = {
  short: 300,
  medium: 750,
  long: 1500,
};

export interface ScriptRequest {
  topic: string;
  format: FormatKind;
  length: ScriptLength;
  /** Research notes in markdown; may say that no live research was done. */
  notes: string;
}
