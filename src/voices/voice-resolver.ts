import { FormatKind, VoiceIdentity } from '../domain/types';
import { normalizeSpeakerLabel } from '../script/script-parser';
import { FORMAT_SPEAKERS, SynthesisSettings } from './voice-config';
import { UnknownSpeakerError } from './voices.errors';

export interface VoiceResolverOptions {
  format: FormatKind;
  roleVoices: Record<string, string>;
  overrides?: Record<string, string>;
  settings: SynthesisSettings;
}

/**
 * Maps speaker labels to voices for one run. Overrides win over the format's
 * roster; anything else is an error rather than a guess. Results are cached
 * per label and interned per voice id, so labels sharing a voice get the
 * same object.
 */
export class VoiceResolver {
  readonly format: FormatKind;
  private readonly overrides = new Map<string, string>();
  private readonly roster = new Map<string, string>();
  private readonly byLabel = new Map<string, VoiceIdentity>();
  private readonly byVoiceId = new Map<string, VoiceIdentity>();

  constructor(private readonly options: VoiceResolverOptions) {
    this.format = options.format;
    for (const [label, voiceId] of Object.entries(options.overrides ?? {})) {
      this.overrides.set(normalizeSpeakerLabel(label), voiceId);
    }
    for (const role of FORMAT_SPEAKERS[options.format]) {
      const voiceId = options.roleVoices[role];
      if (voiceId) {
        this.roster.set(role, voiceId);
      }
    }
  }

  get expectedSpeakers(): readonly string[] {
    return FORMAT_SPEAKERS[this.format];
  }

  resolve(label: string, turnIndex?: number): VoiceIdentity {
    const speaker = normalizeSpeakerLabel(label);
    const cached = this.byLabel.get(speaker);
    if (cached) {
      return cached;
    }
    const voiceId = this.overrides.get(speaker) ?? this.roster.get(speaker);
    if (!voiceId) {
      throw new UnknownSpeakerError(speaker, this.format, this.expectedSpeakers, turnIndex);
    }
    const identity = this.intern(voiceId);
    this.byLabel.set(speaker, identity);
    return identity;
  }

  private intern(voiceId: string): VoiceIdentity {
    const existing = this.byVoiceId.get(voiceId);
    if (existing) {
      return existing;
    }
    const identity: VoiceIdentity = Object.freeze({
      voiceId,
      model: this.options.settings.model,
      outputFormat: this.options.settings.outputFormat,
    });
    this.byVoiceId.set(voiceId, identity);
    return identity;
  }
}
