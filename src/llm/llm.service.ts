import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCRIPT_WRITER_TOKEN } from './llm.constants';
import { ScriptWriter } from './llm.provider';
import { ScriptRequest } from './llm.types';

const SPEAKER_LINE = /^[^:\s][^:]*:\s*\S/;

/**
 * Drops what models wrap around the dialogue (code fences, headings, bold
 * labels, stray prose) so the result parses as a script.
 */
export function cleanGeneratedScript(raw: string): { script: string; dropped: number } {
  const kept: string[] = [];
  let dropped = 0;
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^\*\*([^*:]+):?\*\*:?/, '$1:');
    if (!trimmed) {
      continue;
    }
    if (trimmed.startsWith('```') || trimmed.startsWith('#') || !SPEAKER_LINE.test(trimmed)) {
      dropped += 1;
      continue;
    }
    kept.push(trimmed);
  }
  return { script: kept.join('\n'), dropped };
}

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);

  constructor(@Inject(SCRIPT_WRITER_TOKEN) private readonly writer: ScriptWriter) {}

  async generateScript(request: ScriptRequest): Promise<string> {
    this.logger.log(`[script:${this.writer.name}] ${request.format}/${request.length} script for "${request.topic}"`);
    const raw = await this.writer.generateScript(request);
    const { script, dropped } = cleanGeneratedScript(raw);
    if (dropped) {
      this.logger.warn(`Dropped ${dropped} line(s) without a speaker label from the generated script`);
    }
    if (!script) {
      throw new Error(`${this.writer.name} returned no speaker lines for "${request.topic}"`);
    }
    return script;
  }
}
