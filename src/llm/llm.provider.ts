import { ScriptRequest } from './llm.types';

export interface ScriptWriter {
  readonly name: string;
  /** Raw model output, expected to be `LABEL: text` lines. */
  generateScript(request: ScriptRequest): Promise<string>;
}
