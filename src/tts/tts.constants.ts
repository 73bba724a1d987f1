export const TTS_PROVIDER_TOKEN = 'TTS_PROVIDER';
export const SEGMENT_GENERATOR_OPTIONS = 'SEGMENT_GENERATOR_OPTIONS';
