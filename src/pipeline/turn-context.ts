import { AdjacentText, Turn, VoiceIdentity } from '../domain/types';
import { headOf, tailOf } from '../tts/text-chunks';

export const CONTEXT_LOOKAROUND = 3;

/**
 * Text of the nearest turns, within `CONTEXT_LOOKAROUND` positions, spoken in
 * the same voice as `turns[index]`.
 */
export function adjacentTextFor(
  turns: readonly Turn[],
  voices: readonly (VoiceIdentity | undefined)[],
  index: number,
): AdjacentText {
  const voiceId = voices[index]?.voiceId;
  if (!voiceId) {
    return {};
  }
  const sameVoice = (candidate: number) => voices[candidate]?.voiceId === voiceId;

  let previousText: string | undefined;
  for (let offset = 1; offset <= CONTEXT_LOOKAROUND && index - offset >= 0; offset += 1) {
    if (sameVoice(index - offset)) {
      previousText = tailOf(turns[index - offset].text);
      break;
    }
  }
  let nextText: string | undefined;
  for (let offset = 1; offset <= CONTEXT_LOOKAROUND && index + offset < turns.length; offset += 1) {
    if (sameVoice(index + offset)) {
      nextText = headOf(turns[index + offset].text);
      break;
    }
  }
  return { previousText, nextText };
}
