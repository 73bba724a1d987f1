import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { SynthesisRequest, SynthesisResult, TtsProvider } from './tts.interfaces';

const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
const OPENAI_FORMATS = ['mp3', 'opus', 'aac', 'flac', 'wav', 'pcm'] as const;

type OpenAiVoice = (typeof OPENAI_VOICES)[number];
type OpenAiFormat = (typeof OPENAI_FORMATS)[number];

function isOpenAiVoice(value: string): value is OpenAiVoice {
  return (OPENAI_VOICES as readonly string[]).includes(value);
}

function isOpenAiFormat(value: string): value is OpenAiFormat {
  return (OPENAI_FORMATS as readonly string[]).includes(value);
}

/**
 * OpenAI speech has no request stitching, so continuity hints are dropped; the
 * response's `x-request-id` is still reported as the generation id.
 */
@Injectable()
export class OpenAiTtsProvider implements TtsProvider {
  readonly name = 'openai';
  private readonly logger = new Logger(OpenAiTtsProvider.name);
  private client: OpenAI | null = null;

  constructor(private readonly configService: ConfigService) {}

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const voice = request.voiceId.trim().toLowerCase();
    if (!isOpenAiVoice(voice)) {
      throw new Error(`Unknown OpenAI voice "${request.voiceId}"; expected one of ${OPENAI_VOICES.join(', ')}`);
    }
    if (!isOpenAiFormat(request.outputFormat)) {
      throw new Error(`Unsupported OpenAI output format "${request.outputFormat}"`);
    }
    if (request.previousRequestIds.length) {
      this.logger.debug(`Ignoring ${request.previousRequestIds.length} continuity hint(s) for voice ${voice}`);
    }

    const client = this.getClient();
    const { data, response } = await client.audio.speech
      .create(
        {
          model: request.model,
          voice,
          input: request.text,
          response_format: request.outputFormat,
        },
        { signal: request.signal },
      )
      .withResponse();
    const audio = Buffer.from(await data.arrayBuffer());
    if (!audio.length) {
      throw new Error(`OpenAI returned an empty audio body for voice ${voice}`);
    }
    return { audio, generationId: response.headers.get('x-request-id') ?? undefined };
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY must be set for OpenAI TTS');
    }
    this.client = new OpenAI({
      apiKey,
      baseURL: this.configService.get<string>('OPENAI_BASE_URL') || undefined,
      maxRetries: 0,
    });
    return this.client;
  }
}
