import { z } from 'zod';
import { errorMessage } from '../common/describe-error';
import { MAX_HISTORY_SIZE } from '../continuity/continuity-ledger';
import { parseVoiceOverrides } from '../voices/voice-config';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalInt = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional());

const optionalEnum = <T extends [string, ...string[]]>(values: T) =>
  z.preprocess(
    (value) => {
      const blank = blankToUndefined(value);
      return typeof blank === 'string' ? blank.trim().toLowerCase() : blank;
    },
    z.enum(values).optional(),
  );

export const envSchema = z
  .object({
    TTS_PROVIDER: optionalEnum(['elevenlabs', 'openai']),
    ELEVENLABS_REQUEST_ID_ORDER: optionalEnum(['oldest-first', 'newest-first']),
    ELEVENLABS_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    OPENAI_TTS_FORMAT: optionalEnum(['mp3', 'opus', 'aac', 'flac', 'wav', 'pcm']),
    VOICE_OVERRIDES: z.preprocess(
      blankToUndefined,
      z
        .string()
        .optional()
        .superRefine((value, ctx) => {
          try {
            parseVoiceOverrides(value);
          } catch (error) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
          }
        }),
    ),
    TTS_MAX_ATTEMPTS: optionalInt(1, 10),
    TTS_RETRY_BASE_DELAY_MS: optionalInt(0),
    TTS_RETRY_MAX_DELAY_MS: optionalInt(0),
    TTS_TIMEOUT_MS: optionalInt(1),
    TTS_CHUNK_CHAR_LIMIT: optionalInt(100),
    TTS_CONCURRENCY: optionalInt(1, 16),
    CONTINUITY_HISTORY_SIZE: optionalInt(1, MAX_HISTORY_SIZE),
    AUDIO_JOINER: optionalEnum(['auto', 'ffmpeg', 'concat']),
    STORAGE_DRIVER: optionalEnum(['local', 's3']),
    LLM_PROVIDER: optionalEnum(['openai', 'xai', 'grok']),
  })
  .passthrough();

export type ValidatedEnv = z.infer<typeof envSchema>;

/** `ConfigModule.forRoot({ validate })` hook; reports every bad key at once. */
export function validateEnv(config: Record<string, unknown>): ValidatedEnv {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${problems.join('\n')}`);
  }
  return result.data;
}
