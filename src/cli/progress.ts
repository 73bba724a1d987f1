import { TurnProgressEvent } from '../pipeline/pipeline.types';

/** One line per settled turn, e.g. `[2/5] CO-HOST [laughing]`. */
export function formatProgress(event: TurnProgressEvent): string {
  const tag = event.leadingTag ? ` [${event.leadingTag}]` : '';
  const outcome = event.state === 'done' ? '' : ` (${event.state})`;
  return `[${event.turnIndex + 1}/${event.totalTurns}] ${event.speaker}${tag}${outcome}`;
}
