import { Injectable, Logger } from '@nestjs/common';
import { parseBuffer } from 'music-metadata';
import { errorMessage } from '../common/describe-error';
import { mimeTypeFor } from './audio-format';

@Injectable()
export class AudioMetadataService {
  private readonly logger = new Logger(AudioMetadataService.name);

  /** Whole seconds, or undefined when the container carries no usable duration. */
  async measureDurationSeconds(buffer: Buffer, outputFormat: string): Promise<number | undefined> {
    const mimeType = mimeTypeFor(outputFormat);
    if (!mimeType) {
      return undefined;
    }
    try {
      const metadata = await parseBuffer(buffer, mimeType);
      const seconds = metadata.format.duration;
      if (!seconds || !isFinite(seconds) || seconds <= 0) {
        return undefined;
      }
      return Math.round(seconds);
    } catch (error) {
      this.logger.warn(`Failed to read audio duration: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
