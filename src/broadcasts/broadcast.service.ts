import { Injectable, Logger } from '@nestjs/common';
import { fileExtensionFor, mimeTypeFor } from '../audio/audio-format';
import { AudioMetadataService } from '../audio/audio-metadata.service';
import { describeError } from '../common/describe-error';
import { LlmService } from '../llm/llm.service';
import { PerplexityService } from '../research/perplexity.service';
import { PipelineService } from '../pipeline/pipeline.service';
import { StorageService } from '../storage/storage.service';
import { BroadcastRequest, BroadcastResult, BroadcastStage } from './broadcast.types';
import { outputPrefixFor } from './broadcast.utils';

@Injectable()
export class BroadcastService {
  private readonly logger = new Logger(BroadcastService.name);

  constructor(
    private readonly perplexityService: PerplexityService,
    private readonly llmService: LlmService,
    private readonly pipelineService: PipelineService,
    private readonly audioMetadataService: AudioMetadataService,
    private readonly storageService: StorageService,
  ) {}

  async produce(request: BroadcastRequest): Promise<BroadcastResult> {
    const prefix = outputPrefixFor(request.topic, request.format, request.outputPrefix);
    let stage: BroadcastStage = 'init';
    const enter = (next: BroadcastStage) => {
      stage = next;
      request.onStage?.(next);
    };

    try {
      let script = request.script;
      let researchKey: string | undefined;
      if (script === undefined) {
        let notes = `Topic: ${request.topic}\nNo research gathered.`;
        if (!request.skipResearch) {
          enter('research');
          const research = await this.perplexityService.research(request.topic);
          notes = research.markdown;
          if (research.live) {
            researchKey = (await this.storageService.uploadText(research.markdown, `${prefix}/research.md`)).key;
          }
        }
        enter('script');
        script = await this.llmService.generateScript({
          topic: request.topic,
          format: request.format,
          length: request.length ?? 'medium',
          notes,
        });
      } else {
        enter('script');
      }
      const scriptKey = (await this.storageService.uploadText(script, `${prefix}/script.txt`)).key;

      enter('parse');
      const preview = this.pipelineService.preview({
        script,
        format: request.format,
        overrides: request.overrides,
        failurePolicy: request.failurePolicy,
      });
      this.logger.log(
        `${preview.summary.turnCount} turns, ${preview.summary.wordCount} words; speakers: ${preview.summary.speakers.join(', ')}`,
      );

      if (request.dryRun) {
        enter('dry_run');
        return {
          prefix,
          scriptKey,
          researchKey,
          summary: preview.summary,
          preview,
          gaps: [],
          dryRun: true,
        };
      }

      enter('synthesize');
      const result = await this.pipelineService.run({
        script,
        format: request.format,
        overrides: request.overrides,
        failurePolicy: request.failurePolicy,
        concurrency: request.concurrency,
        signal: request.signal,
        onTurnSettled: request.onTurnSettled,
      });

      enter('measure');
      const durationSeconds = await this.audioMetadataService.measureDurationSeconds(result.audio, result.outputFormat);

      enter('store');
      const upload = await this.storageService.uploadAudio(
        result.audio,
        `${prefix}/final.${fileExtensionFor(result.outputFormat)}`,
        mimeTypeFor(result.outputFormat) ?? 'application/octet-stream',
      );
      this.logger.log(`Broadcast stored at ${upload.key}${durationSeconds ? ` (${durationSeconds}s)` : ''}`);

      return {
        prefix,
        scriptKey,
        researchKey,
        audioKey: upload.key,
        audioUrl: upload.url,
        summary: preview.summary,
        preview,
        gaps: result.gaps,
        durationSeconds,
        dryRun: false,
      };
    } catch (error) {
      this.logger.error(`Failed to produce broadcast at ${stage}: ${describeError(error)}`);
      throw error;
    }
  }
}
