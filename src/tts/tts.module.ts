import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DEFAULT_HISTORY_SIZE } from '../continuity/continuity-ledger';
import { getTtsProviderName } from '../voices/voice-config';
import { ElevenLabsProvider } from './elevenlabs.provider';
import { OpenAiTtsProvider } from './openai-tts.provider';
import { retryPolicyFromConfig } from './retry-policy';
import { SegmentGeneratorOptions, SegmentGeneratorService } from './segment-generator.service';
import { DEFAULT_CHUNK_CHAR_LIMIT } from './text-chunks';
import { SEGMENT_GENERATOR_OPTIONS, TTS_PROVIDER_TOKEN } from './tts.constants';
import { TtsProvider } from './tts.interfaces';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TTS_PROVIDER_TOKEN,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TtsProvider => {
        if (getTtsProviderName(configService) === 'openai') {
          return new OpenAiTtsProvider(configService);
        }
        return new ElevenLabsProvider(configService);
      },
    },
    {
      provide: SEGMENT_GENERATOR_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): SegmentGeneratorOptions => ({
        retryPolicy: retryPolicyFromConfig(configService),
        chunkCharLimit: configService.get<number>('TTS_CHUNK_CHAR_LIMIT') ?? DEFAULT_CHUNK_CHAR_LIMIT,
        historySize: configService.get<number>('CONTINUITY_HISTORY_SIZE') ?? DEFAULT_HISTORY_SIZE,
      }),
    },
    SegmentGeneratorService,
  ],
  exports: [TTS_PROVIDER_TOKEN, SEGMENT_GENERATOR_OPTIONS, SegmentGeneratorService],
})
export class TtsModule {}
