import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AUDIO_JOINER_TOKEN, AudioJoiner } from './audio-joiner';
import { AudioMetadataService } from './audio-metadata.service';
import { ConcatAudioJoiner } from './concat-audio-joiner';
import { FfmpegAudioJoiner } from './ffmpeg-audio-joiner';
import { FormatAwareAudioJoiner } from './format-aware-audio-joiner';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: AUDIO_JOINER_TOKEN,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): AudioJoiner => {
        const kind = (configService.get<string>('AUDIO_JOINER') || 'auto').toLowerCase();
        const ffmpeg = new FfmpegAudioJoiner(configService.get<string>('FFMPEG_PATH') || 'ffmpeg');
        if (kind === 'ffmpeg') {
          return ffmpeg;
        }
        if (kind === 'concat') {
          return new ConcatAudioJoiner();
        }
        if (kind === 'auto') {
          return new FormatAwareAudioJoiner(new ConcatAudioJoiner(), ffmpeg);
        }
        throw new Error(`Unsupported audio joiner: ${kind}`);
      },
    },
    AudioMetadataService,
  ],
  exports: [AUDIO_JOINER_TOKEN, AudioMetadataService],
})
export class AudioModule {}
