import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FORMAT_KINDS, FormatKind } from '../domain/types';
import {
  FORMAT_SPEAKERS,
  getRoleVoices,
  getSynthesisSettings,
  parseVoiceOverrides,
  SynthesisSettings,
} from './voice-config';
import { VoiceResolver } from './voice-resolver';

export interface VoiceAssignment {
  format: FormatKind;
  role: string;
  voiceId: string;
  overridden: boolean;
}

@Injectable()
export class VoicesService {
  constructor(private readonly configService: ConfigService) {}

  /** Fresh resolver for one run; `overrides` are layered over `VOICE_OVERRIDES`. */
  createResolver(format: FormatKind, overrides: Record<string, string> = {}): VoiceResolver {
    return new VoiceResolver({
      format,
      roleVoices: getRoleVoices(this.configService),
      overrides: { ...this.getConfiguredOverrides(), ...overrides },
      settings: this.getSettings(),
    });
  }

  getSettings(): SynthesisSettings {
    return getSynthesisSettings(this.configService);
  }

  describeAssignments(format?: FormatKind, overrides: Record<string, string> = {}): VoiceAssignment[] {
    const formats = format ? [format] : FORMAT_KINDS;
    const roleVoices = getRoleVoices(this.configService);
    const effectiveOverrides = { ...this.getConfiguredOverrides(), ...overrides };
    return formats.flatMap((kind) =>
      FORMAT_SPEAKERS[kind].map((role) => ({
        format: kind,
        role,
        voiceId: effectiveOverrides[role] ?? roleVoices[role],
        overridden: role in effectiveOverrides,
      })),
    );
  }

  private getConfiguredOverrides(): Record<string, string> {
    return parseVoiceOverrides(this.configService.get<string>('VOICE_OVERRIDES'));
  }
}
