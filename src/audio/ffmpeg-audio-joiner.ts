import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { Logger } from '@nestjs/common';
import { errorCodeOf } from '../common/describe-error';
import { AudioJoiner, AudioJoinError } from './audio-joiner';
import { fileExtensionFor } from './audio-format';

/** ffmpeg concat demuxer list; single quotes in paths are escaped. */
export function buildConcatList(partPaths: readonly string[]): string {
  return partPaths.map((partPath) => `file '${partPath.replace(/'/g, "'\\''")}'`).join('\n');
}

export class FfmpegAudioJoiner implements AudioJoiner {
  readonly name = 'ffmpeg';
  private readonly logger = new Logger(FfmpegAudioJoiner.name);

  constructor(
    private readonly ffmpegPath: string,
    private readonly workRoot = path.resolve(process.cwd(), 'tmp', 'stitch'),
  ) {}

  async join(parts: readonly Buffer[], outputFormat: string): Promise<Buffer> {
    if (!parts.length) {
      throw new AudioJoinError('No audio parts to join');
    }
    if (parts.length === 1) {
      return parts[0];
    }

    const extension = fileExtensionFor(outputFormat);
    const workingDir = path.join(this.workRoot, uuid());
    await fs.mkdir(workingDir, { recursive: true });
    try {
      const partPaths: string[] = [];
      for (const [index, part] of parts.entries()) {
        const partPath = path.join(workingDir, `part-${index}.${extension}`);
        await fs.writeFile(partPath, part);
        partPaths.push(partPath);
      }
      const listPath = path.join(workingDir, 'concat.txt');
      await fs.writeFile(listPath, buildConcatList(partPaths));

      const outputPath = path.join(workingDir, `output.${extension}`);
      await this.runFfmpeg(['-y', '-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath]);
      const joined = await fs.readFile(outputPath);
      this.logger.log(`Joined ${parts.length} parts into ${joined.length} bytes`);
      return joined;
    } finally {
      await fs.rm(workingDir, { recursive: true, force: true });
    }
  }

  private runFfmpeg(args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.ffmpegPath, args, { stdio: 'ignore' });
      proc.on('error', (error) => {
        const reason =
          errorCodeOf(error) === 'ENOENT' ? `ffmpeg binary not found at "${this.ffmpegPath}"` : error.message;
        reject(new AudioJoinError(`Cannot join audio: ${reason}`, { cause: error }));
      });
      proc.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new AudioJoinError(`ffmpeg exited with code ${code}`));
        }
      });
    });
  }
}
