import { AudioJoiner, AudioJoinError } from './audio-joiner';

export class ConcatAudioJoiner implements AudioJoiner {
  readonly name = 'concat';

  async join(parts: readonly Buffer[]): Promise<Buffer> {
    if (!parts.length) {
      throw new AudioJoinError('No audio parts to join');
    }
    return parts.length === 1 ? parts[0] : Buffer.concat(parts);
  }
}
