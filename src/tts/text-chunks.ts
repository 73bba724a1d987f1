export const DEFAULT_CHUNK_CHAR_LIMIT = 4000;
const CONTEXT_CHARS = 200;

/**
 * Splits text into trimmed runs of whole sentences no longer than `limit`.
 * Sentence ends (`.`, `!`, `?` followed by whitespace) inside `[...]` tags are
 * ignored, so a tag always lands in one chunk. A single sentence longer than
 * the limit becomes a chunk of its own.
 */
export function splitIntoChunks(text: string, limit = DEFAULT_CHUNK_CHAR_LIMIT): string[] {
  if (text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let current = '';
  for (const sentence of splitSentences(text)) {
    if (current && current.length + sentence.length > limit) {
      chunks.push(current.trim());
      current = sentence;
    } else {
      current += sentence;
    }
  }
  if (current.trim()) {
    chunks.push(current.trim());
  }
  return chunks.length ? chunks : [text];
}

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let current = '';
  let depth = 0;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    current += char;
    if (char === '[') {
      depth += 1;
    } else if (char === ']') {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && (char === '.' || char === '!' || char === '?')) {
      const next = text[i + 1];
      if (next === undefined || /\s/.test(next)) {
        sentences.push(current);
        current = '';
      }
    }
  }
  if (current) {
    sentences.push(current);
  }
  return sentences;
}

// Counts code points so a surrogate pair is never cut in half.
export function tailOf(text: string | undefined, chars = CONTEXT_CHARS): string | undefined {
  return text ? Array.from(text).slice(-chars).join('') : undefined;
}

export function headOf(text: string | undefined, chars = CONTEXT_CHARS): string | undefined {
  return text ? Array.from(text).slice(0, chars).join('') : undefined;
}
