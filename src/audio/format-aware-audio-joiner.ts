import { AudioJoiner } from './audio-joiner';
import { isRawFormat } from './audio-format';

/** Appends raw PCM/μ-law bytes directly and hands containers to the encoder-aware joiner. */
export class FormatAwareAudioJoiner implements AudioJoiner {
  readonly name = 'auto';

  constructor(
    private readonly raw: AudioJoiner,
    private readonly encoded: AudioJoiner,
  ) {}

  join(parts: readonly Buffer[], outputFormat: string): Promise<Buffer> {
    return (isRawFormat(outputFormat) ? this.raw : this.encoded).join(parts, outputFormat);
  }
}
