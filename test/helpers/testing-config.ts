import { ConfigModule } from '@nestjs/config';

export const TEST_CONFIG = {
  TTS_PROVIDER: 'elevenlabs',
  ELEVENLABS_API_KEY: 'test-secret',
  ELEVENLABS_MODEL_ID: 'test-model',
  ELEVENLABS_OUTPUT_FORMAT: 'mp3_44100_128',
  VOICE_HOST: 'voice-host',
  VOICE_CO_HOST: 'voice-cohost',
  VOICE_ANCHOR: 'voice-anchor',
};

/** Global config backed by fixed values instead of the environment or a .env file. */
export function testingConfigModule(overrides: Record<string, unknown> = {}) {
  return ConfigModule.forRoot({
    isGlobal: true,
    ignoreEnvFile: true,
    load: [() => ({ ...TEST_CONFIG, ...overrides })],
  });
}
