import { ConfigService } from '@nestjs/config';
import { FormatKind } from '../domain/types';
import { normalizeSpeakerLabel } from '../script/script-parser';

export type TtsProviderName = 'elevenlabs' | 'openai';

export interface SynthesisSettings {
  model: string;
  outputFormat: string;
}

// Roles each format's scripts are written for.
export const FORMAT_SPEAKERS: Record<FormatKind, readonly string[]> = {
  news: ['ANCHOR'],
  podcast: ['HOST', 'CO-HOST'],
  debate: ['MODERATOR', 'SIDE-A', 'SIDE-B'],
  narrative: ['NARRATOR'],
};

const ELEVENLABS_ROLE_VOICES: Record<string, string> = {
  ANCHOR: 'cjVigY5qzO86Huf0OWal',
  HOST: 'cjVigY5qzO86Huf0OWal',
  'CO-HOST': 'TX3LPaxmHKxFdv7VOQHJ',
  MODERATOR: 'cjVigY5qzO86Huf0OWal',
  'SIDE-A': 'TX3LPaxmHKxFdv7VOQHJ',
  'SIDE-B': 'EXAVITQu4vr4xnSAxGW1',
  NARRATOR: 'nPczCjz82KWdKScP46A1',
};

const OPENAI_ROLE_VOICES: Record<string, string> = {
  ANCHOR: 'onyx',
  HOST: 'alloy',
  'CO-HOST': 'nova',
  MODERATOR: 'onyx',
  'SIDE-A': 'echo',
  'SIDE-B': 'shimmer',
  NARRATOR: 'fable',
};

export function getTtsProviderName(configService: ConfigService): TtsProviderName {
  const provider = (configService.get<string>('TTS_PROVIDER') || 'elevenlabs').toLowerCase();
  if (provider === 'elevenlabs' || provider === 'openai') {
    return provider;
  }
  throw new Error(`Unsupported TTS provider: ${provider}`);
}

/** `VOICE_CO_HOST` style key for a canonical role label. */
export function roleConfigKey(role: string): string {
  return `VOICE_${role.replace(/-/g, '_')}`;
}

/**
 * Built-in role voices for the active provider; each role can be repointed
 * with its `VOICE_*` key.
 */
export function getRoleVoices(configService: ConfigService): Record<string, string> {
  const defaults = getTtsProviderName(configService) === 'openai' ? OPENAI_ROLE_VOICES : ELEVENLABS_ROLE_VOICES;
  const voices: Record<string, string> = {};
  for (const [role, voiceId] of Object.entries(defaults)) {
    voices[role] = configService.get<string>(roleConfigKey(role))?.trim() || voiceId;
  }
  return voices;
}

export function getSynthesisSettings(configService: ConfigService): SynthesisSettings {
  if (getTtsProviderName(configService) === 'openai') {
    return {
      model: configService.get<string>('OPENAI_TTS_MODEL') ?? 'gpt-4o-mini-tts',
      outputFormat: configService.get<string>('OPENAI_TTS_FORMAT') ?? 'mp3',
    };
  }
  return {
    model: configService.get<string>('ELEVENLABS_MODEL_ID') ?? 'eleven_multilingual_v2',
    outputFormat: configService.get<string>('ELEVENLABS_OUTPUT_FORMAT') ?? 'mp3_44100_128',
  };
}

/**
 * Parses `LABEL=voiceId` pairs (comma separated, or one per entry) into a
 * mapping keyed by canonical speaker label. Later entries win.
 */
export function parseVoiceOverrides(raw: string | readonly string[] | undefined): Record<string, string> {
  const entries = typeof raw === 'string' ? raw.split(',') : [...(raw ?? [])];
  const overrides: Record<string, string> = {};
  for (const entry of entries) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.indexOf('=');
    const label = separator > 0 ? trimmed.slice(0, separator).trim() : '';
    const voiceId = separator > 0 ? trimmed.slice(separator + 1).trim() : '';
    if (!label || !voiceId) {
      throw new Error(`Invalid voice override "${trimmed}"; expected LABEL=voiceId`);
    }
    overrides[normalizeSpeakerLabel(label)] = voiceId;
  }
  return overrides;
}
