import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AudioModule } from '../audio/audio.module';
import { TtsModule } from '../tts/tts.module';
import { VoicesModule } from '../voices/voices.module';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [ConfigModule, VoicesModule, TtsModule, AudioModule],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
