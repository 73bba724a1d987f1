/** Container-free formats whose bytes can be appended directly. */
const RAW_FORMAT_PREFIXES = ['pcm', 'ulaw', 'alaw'];

const MIME_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  opus: 'audio/ogg',
  aac: 'audio/aac',
  flac: 'audio/flac',
  wav: 'audio/wav',
};

/** `mp3_44100_128` -> `mp3`; OpenAI style names pass through. */
export function formatCodec(outputFormat: string): string {
  return outputFormat.trim().toLowerCase().split('_')[0];
}

export function isRawFormat(outputFormat: string): boolean {
  return RAW_FORMAT_PREFIXES.includes(formatCodec(outputFormat));
}

export function fileExtensionFor(outputFormat: string): string {
  return isRawFormat(outputFormat) ? 'raw' : formatCodec(outputFormat);
}

export function mimeTypeFor(outputFormat: string): string | undefined {
  return MIME_TYPES[formatCodec(outputFormat)];
}
