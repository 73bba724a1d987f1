import { FormatKind } from '../domain/types';
import { FORMAT_SPEAKERS } from '../voices/voice-config';
import { LENGTH_WORD_TARGETS, ScriptRequest } from './llm.types';

const AUDIO_ONLY =
  'The listener only hears this. No visual references, no channel or show names, no greetings to viewers and no sign-offs. Start with the substance.';

const FORMAT_BRIEFS: Record<FormatKind, string> = {
  news: 'You write bulletins for a single news ANCHOR: measured, precise, one story thread at a time.',
  podcast:
    'You write a conversational episode for HOST and CO-HOST: quick exchanges, reactions, the odd interruption and genuine curiosity.',
  debate:
    'You write a moderated debate: MODERATOR frames each question, SIDE-A and SIDE-B argue opposite positions firmly but civilly.',
  narrative: 'You write documentary narration for a single NARRATOR: atmospheric, paced, building toward a clear payoff.',
};

const TAG_EXAMPLES: Record<FormatKind, string> = {
  news: '[serious], [thoughtful], [excited], [sigh]',
  podcast: '[laughing], [surprised], [excited], [whispers], [sigh]',
  debate: '[sarcastic], [annoyed], [thoughtful], [surprised]',
  narrative: '[whispers], [long pause], [dramatic], [sad]',
};

export function buildSystemPrompt(format: FormatKind, length: ScriptRequest['length']): string {
  const speakers = FORMAT_SPEAKERS[format].join(', ');
  return `${FORMAT_BRIEFS[format]}

Rules:
- ${AUDIO_ONLY}
- Use only these speaker labels: ${speakers}.
- Write one line per speaker turn in the form LABEL: text.
- Put bracketed delivery tags such as ${TAG_EXAMPLES[format]} inline wherever the delivery changes; they may appear anywhere in a line.
- No headings, markdown, stage directions outside brackets, or blank commentary.

Target length: about ${LENGTH_WORD_TARGETS[length]} words.`;
}

export function buildUserPrompt(request: ScriptRequest): string {
  return `Topic: ${request.topic}

Research:
${request.notes.trim() || 'None provided'}

Write the script now. Output only the dialogue lines.`;
}
