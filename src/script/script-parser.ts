import { ScriptSummary, Turn } from '../domain/types';
import { EmptyScriptError, MalformedTurnError } from './script.errors';

// Script labels that name the same role.
const SPEAKER_ALIASES: Record<string, string> = {
  COHOST: 'CO-HOST',
  SIDEA: 'SIDE-A',
  SIDEB: 'SIDE-B',
};

const LINE_PATTERN = /^([^:]+):\s*(.*)$/;
const LEADING_TAG_PATTERN = /^\[([^\]]+)\]/;
const COMMENT_PREFIXES = ['#', '//'];

/**
 * Canonical speaker identity used as the map key everywhere downstream
 * (voice overrides included): trimmed, whitespace and underscores folded to
 * `-`, uppercased, then passed through the alias table.
 */
export function normalizeSpeakerLabel(raw: string): string {
  const folded = raw.trim().replace(/[\s_]+/g, '-').toUpperCase();
  return SPEAKER_ALIASES[folded] ?? folded;
}

export function parseScript(rawText: string): Turn[] {
  const turns: Turn[] = [];
  const lines = (rawText ?? '').split(/\r?\n/);

  for (const [offset, line] of lines.entries()) {
    const lineNumber = offset + 1;
    const trimmed = line.trim();
    if (!trimmed || isComment(trimmed)) {
      continue;
    }

    const match = trimmed.match(LINE_PATTERN);
    const label = match?.[1]?.trim();
    if (!match || !label) {
      throw new MalformedTurnError(lineNumber, line);
    }
    const text = (match[2] ?? '').trim();
    if (!text) {
      throw new MalformedTurnError(lineNumber, line, 'turn has no text');
    }

    const leadingTag = text.match(LEADING_TAG_PATTERN)?.[1]?.trim();
    turns.push(
      Object.freeze({
        index: turns.length,
        speaker: normalizeSpeakerLabel(label),
        text,
        lineNumber,
        ...(leadingTag ? { leadingTag } : {}),
      }),
    );
  }

  if (!turns.length) {
    throw new EmptyScriptError();
  }
  return turns;
}

export function summarizeScript(turns: readonly Turn[]): ScriptSummary {
  const wordCount = turns.reduce((total, turn) => total + turn.text.split(/\s+/).filter(Boolean).length, 0);
  const speakers = [...new Set(turns.map((turn) => turn.speaker))].sort();
  return { turnCount: turns.length, wordCount, speakers };
}

export function renderScript(turns: readonly Turn[]): string {
  return turns.map((turn) => `${turn.speaker}: ${turn.text}`).join('\n');
}

function isComment(line: string): boolean {
  return COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix));
}
