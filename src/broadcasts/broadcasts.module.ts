import { Module } from '@nestjs/common';
import { AudioModule } from '../audio/audio.module';
import { LlmModule } from '../llm/llm.module';
import { ResearchModule } from '../research/research.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { StorageModule } from '../storage/storage.module';
import { BroadcastService } from './broadcast.service';

@Module({
  imports: [ResearchModule, LlmModule, PipelineModule, AudioModule, StorageModule],
  providers: [BroadcastService],
  exports: [BroadcastService],
})
export class BroadcastsModule {}
