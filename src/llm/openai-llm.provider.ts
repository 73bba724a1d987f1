import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { errorCodeOf, errorMessage, httpStatusOf } from '../common/describe-error';
import { ScriptWriter } from './llm.provider';
import { LENGTH_WORD_TARGETS, ScriptRequest } from './llm.types';
import { buildSystemPrompt, buildUserPrompt } from './script-prompts';

export interface OpenAiLlmProviderOptions {
  apiKeyConfigKeys?: string[];
  baseUrlConfigKeys?: string[];
  scriptModelConfigKeys?: string[];
  defaultBaseUrl?: string;
  defaultScriptModel?: string;
  providerLabel?: string;
  name?: string;
}

const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];
const RETRYABLE_CODES = ['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'ECONNREFUSED'];

@Injectable()
export class OpenAiLlmProvider implements ScriptWriter {
  readonly name: string;
  private client: OpenAI | null = null;
  private readonly scriptModel: string;
  private readonly logger = new Logger(OpenAiLlmProvider.name);
  private readonly providerLabel: string;
  private readonly apiKeyConfigKeys: string[];
  private readonly baseUrlConfigKeys: string[];
  private readonly defaultBaseUrl?: string;

  constructor(private readonly configService: ConfigService, options: OpenAiLlmProviderOptions = {}) {
    this.apiKeyConfigKeys = this.normalizeKeys(options.apiKeyConfigKeys, 'OPENAI_API_KEY');
    this.baseUrlConfigKeys = this.normalizeKeys(options.baseUrlConfigKeys, 'OPENAI_BASE_URL');
    const scriptModelConfigKeys = this.normalizeKeys(options.scriptModelConfigKeys, 'LLM_PROVIDER_SCRIPT_MODEL');
    this.defaultBaseUrl = options.defaultBaseUrl;
    this.scriptModel = this.getFirstConfigValue(scriptModelConfigKeys) ?? options.defaultScriptModel ?? 'gpt-4.1';
    this.providerLabel = options.providerLabel ?? 'OpenAI LLM provider';
    this.name = options.name ?? 'openai';
  }

  async generateScript(request: ScriptRequest): Promise<string> {
    const client = this.getClient();
    const messages = [
      { role: 'system', content: buildSystemPrompt(request.format, request.length) },
      { role: 'user', content: buildUserPrompt(request) },
    ] satisfies ChatCompletionMessageParam[];
    // roughly 1.5 tokens per word plus room for labels and tags
    const maxTokens = Math.ceil(LENGTH_WORD_TARGETS[request.length] * 2.5);

    const maxAttempts = 2;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let content: string | null | undefined = null;
      try {
        const response = await client.chat.completions.create({
          model: this.scriptModel,
          messages,
          temperature: 0.8,
          max_tokens: maxTokens,
        });
        content = response.choices[0]?.message?.content;
      } catch (error) {
        if (this.isRetryableLlmError(error) && attempt < maxAttempts) {
          this.logger.warn(
            `${this.providerLabel} request failed for ${request.format} script (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`,
          );
          continue;
        }
        throw error;
      }

      const cleaned = (content || '').trim();
      if (!cleaned) {
        if (attempt < maxAttempts) {
          this.logger.warn(
            `${this.providerLabel} returned an empty ${request.format} script (attempt ${attempt}/${maxAttempts})`,
          );
          continue;
        }
        throw new Error(`${this.providerLabel} returned empty content for ${request.format} script`);
      }
      return cleaned;
    }
    throw new Error(`${this.providerLabel} failed to generate a ${request.format} script`);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.getFirstConfigValue(this.apiKeyConfigKeys);
      if (!apiKey) {
        throw new Error(`${this.apiKeyConfigKeys[0]} must be set for LLM provider`);
      }
      const baseURL = this.getFirstConfigValue(this.baseUrlConfigKeys) ?? this.defaultBaseUrl;
      this.client = new OpenAI({
        apiKey,
        baseURL: baseURL || undefined,
      });
    }
    return this.client;
  }

  private normalizeKeys(primaryList: string[] | undefined, fallback: string): string[] {
    return Array.from(new Set([...(primaryList || []), fallback])).filter(Boolean);
  }

  private getFirstConfigValue(keys: string[]): string | undefined {
    for (const key of keys) {
      const value = this.configService.get<string>(key);
      if (!value) {
        continue;
      }
      const trimmed = value.trim();
      // unexpanded ${VAR} placeholders from env files
      if (/^\$\{[^}]+\}$/.test(trimmed)) {
        continue;
      }
      return trimmed;
    }
    return undefined;
  }

  private isRetryableLlmError(error: unknown): boolean {
    if (!error) {
      return false;
    }
    const status = httpStatusOf(error);
    if (status !== undefined && RETRYABLE_STATUSES.includes(status)) {
      return true;
    }
    const code = errorCodeOf(error);
    if (code && RETRYABLE_CODES.includes(code)) {
      return true;
    }
    const message = errorMessage(error).toLowerCase();
    return message.includes('socket hang up') || message.includes('timeout') || message.includes('timed out');
  }
}
