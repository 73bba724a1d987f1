export interface SynthesisRequest {
  text: string;
  voiceId: string;
  model: string;
  outputFormat: string;
  /** Generation ids of earlier audio in this voice, oldest first. */
  previousRequestIds: readonly string[];
  previousText?: string;
  nextText?: string;
  signal?: AbortSignal;
}

export interface SynthesisResult {
  audio: Buffer;
  /** Provider-assigned id usable as a continuity hint for later requests. */
  generationId?: string;
}

export interface TtsProvider {
  readonly name: string;
  synthesize(request: SynthesisRequest): Promise<SynthesisResult>;
}
