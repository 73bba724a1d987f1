import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SCRIPT_WRITER_TOKEN } from './llm.constants';
import { ScriptWriter } from './llm.provider';
import { LlmService } from './llm.service';
import { OpenAiLlmProvider } from './openai-llm.provider';
import { XaiLlmProvider } from './xai-llm.provider';

type ProviderName = 'openai' | 'xai';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SCRIPT_WRITER_TOKEN,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ScriptWriter => {
        const providerName = resolveProviderName(configService.get<string>('LLM_PROVIDER') ?? 'openai');
        new Logger('LlmProvider').log(`LLM provider configured: script=${providerName}`);
        if (providerName === 'xai') {
          return new XaiLlmProvider(configService);
        }
        return new OpenAiLlmProvider(configService, {
          apiKeyConfigKeys: ['LLM_PROVIDER_OPENAI_API_KEY', 'OPENAI_API_KEY'],
          baseUrlConfigKeys: ['LLM_PROVIDER_OPENAI_BASE_URL', 'OPENAI_BASE_URL'],
          scriptModelConfigKeys: ['LLM_PROVIDER_OPENAI_SCRIPT_MODEL', 'LLM_PROVIDER_SCRIPT_MODEL'],
          defaultScriptModel: 'gpt-4.1',
        });
      },
    },
    LlmService,
  ],
  exports: [LlmService, SCRIPT_WRITER_TOKEN],
})
export class LlmModule {}

export function resolveProviderName(raw: string): ProviderName {
  const normalized = (raw || '').toLowerCase();
  if (normalized === 'openai') {
    return 'openai';
  }
  if (normalized === 'xai' || normalized === 'grok') {
    return 'xai';
  }
  throw new Error(`Unsupported LLM provider: ${raw}`);
}
