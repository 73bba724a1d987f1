import axios from 'axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SynthesisRequest, SynthesisResult, TtsProvider } from './tts.interfaces';

export type RequestIdOrder = 'oldest-first' | 'newest-first';

export interface ElevenLabsSpeechPayload {
  text: string;
  model_id: string;
  previous_request_ids?: string[];
  previous_text?: string;
  next_text?: string;
}

@Injectable()
export class ElevenLabsProvider implements TtsProvider {
  readonly name = 'elevenlabs';
  private readonly baseUrl: string;
  private readonly requestIdOrder: RequestIdOrder;
  private readonly unstitchedModels: Set<string>;
  private readonly logger = new Logger(ElevenLabsProvider.name);

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('ELEVENLABS_BASE_URL') ?? 'https://api.elevenlabs.io';
    this.requestIdOrder =
      this.configService.get<string>('ELEVENLABS_REQUEST_ID_ORDER') === 'newest-first' ? 'newest-first' : 'oldest-first';
    // eleven_v3 rejects request stitching and text context
    this.unstitchedModels = new Set(
      (this.configService.get<string>('ELEVENLABS_UNSTITCHED_MODELS') ?? 'eleven_v3')
        .split(',')
        .map((model) => model.trim())
        .filter(Boolean),
    );
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const apiKey = this.getApiKey();
    const response = await axios.post<ArrayBuffer>(
      this.buildEndpoint(request.voiceId),
      this.buildPayload(request),
      {
        params: { output_format: request.outputFormat },
        headers: {
          'xi-api-key': apiKey,
          Accept: acceptHeaderFor(request.outputFormat),
          'Content-Type': 'application/json',
        },
        responseType: 'arraybuffer',
        signal: request.signal,
      },
    );

    const audio = Buffer.from(response.data);
    if (!audio.length) {
      throw new Error(`ElevenLabs returned an empty audio body for voice ${request.voiceId}`);
    }
    const requestId: unknown = response.headers['request-id'];
    const generationId = typeof requestId === 'string' && requestId.trim() ? requestId.trim() : undefined;
    if (!generationId) {
      this.logger.warn(`ElevenLabs response for voice ${request.voiceId} had no request-id; continuity skipped`);
    }
    return { audio, generationId };
  }

  buildEndpoint(voiceId: string): string {
    return `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}`;
  }

  buildPayload(request: SynthesisRequest): ElevenLabsSpeechPayload {
    const payload: ElevenLabsSpeechPayload = {
      text: request.text,
      model_id: request.model,
    };
    if (this.unstitchedModels.has(request.model)) {
      return payload;
    }
    if (request.previousRequestIds.length) {
      const ids = [...request.previousRequestIds];
      payload.previous_request_ids = this.requestIdOrder === 'newest-first' ? ids.reverse() : ids;
    }
    if (request.previousText) {
      payload.previous_text = request.previousText;
    }
    if (request.nextText) {
      payload.next_text = request.nextText;
    }
    return payload;
  }

  private getApiKey(): string {
    const apiKey = this.configService.get<string>('ELEVENLABS_API_KEY');
    if (!apiKey) {
      throw new Error('ELEVENLABS_API_KEY must be set for ElevenLabs TTS');
    }
    return apiKey;
  }
}

function acceptHeaderFor(outputFormat: string): string {
  if (outputFormat.startsWith('mp3')) return 'audio/mpeg';
  if (outputFormat.startsWith('opus')) return 'audio/ogg';
  return 'application/octet-stream';
}
