import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAiLlmProvider } from './openai-llm.provider';

/** xAI exposes an OpenAI-compatible chat completions API. */
@Injectable()
export class XaiLlmProvider extends OpenAiLlmProvider {
  constructor(configService: ConfigService) {
    const xaiPrefixes = ['LLM_PROVIDER_XAI', 'LLM_PROVIDER_GROK'];
    super(configService, {
      apiKeyConfigKeys: [...xaiPrefixes.map((prefix) => `${prefix}_API_KEY`), 'XAI_API_KEY'],
      baseUrlConfigKeys: [...xaiPrefixes.map((prefix) => `${prefix}_BASE_URL`), 'XAI_BASE_URL'],
      scriptModelConfigKeys: [...xaiPrefixes.map((prefix) => `${prefix}_SCRIPT_MODEL`), 'LLM_PROVIDER_SCRIPT_MODEL'],
      defaultBaseUrl: 'https://api.x.ai/v1',
      defaultScriptModel: 'grok-4-0709',
      providerLabel: 'XAI LLM provider',
      name: 'xai',
    });
  }
}
