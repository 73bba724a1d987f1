export const AUDIO_JOINER_TOKEN = 'AUDIO_JOINER';

export type AudioJoinerKind = 'auto' | 'ffmpeg' | 'concat';

export interface AudioJoiner {
  readonly name: string;
  /** Joins encoded parts in the given order, with no gaps. */
  join(parts: readonly Buffer[], outputFormat: string): Promise<Buffer>;
}

export class AudioJoinError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioJoinError';
  }
}
