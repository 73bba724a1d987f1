import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AudioModule } from './audio/audio.module';
import { BroadcastsModule } from './broadcasts/broadcasts.module';
import { validateEnv } from './config/env.validation';
import { LlmModule } from './llm/llm.module';
import { ResearchModule } from './research/research.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { StorageModule } from './storage/storage.module';
import { TtsModule } from './tts/tts.module';
import { VoicesModule } from './voices/voices.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    VoicesModule,
    TtsModule,
    AudioModule,
    PipelineModule,
    LlmModule,
    ResearchModule,
    StorageModule,
    BroadcastsModule,
  ],
})
export class AppModule {}
