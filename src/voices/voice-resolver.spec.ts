import { ConfigService } from '@nestjs/config';
import { parseScript } from '../script/script-parser';
import { getRoleVoices, getSynthesisSettings, parseVoiceOverrides, roleConfigKey } from './voice-config';
import { VoiceResolver } from './voice-resolver';
import { UnknownSpeakerError } from './voices.errors';
import { VoicesService } from './voices.service';

const settings = { model: 'test-model', outputFormat: 'mp3_44100_128' };
const roleVoices = {
  ANCHOR: 'voice-anchor',
  HOST: 'voice-host',
  'CO-HOST': 'voice-cohost',
  NARRATOR: 'voice-narrator',
};

describe('VoiceResolver', () => {
  it('resolves the format roster', () => {
    const resolver = new VoiceResolver({ format: 'podcast', roleVoices, settings });

    expect(resolver.resolve('HOST')).toEqual({ voiceId: 'voice-host', model: 'test-model', outputFormat: 'mp3_44100_128' });
    expect(resolver.resolve('CO-HOST').voiceId).toBe('voice-cohost');
  });

  it('returns the identical object for repeated labels', () => {
    const resolver = new VoiceResolver({ format: 'podcast', roleVoices, settings });
    const turns = parseScript('HOST: [excited] Hi!\nCO-HOST: [laughing] Hey!\nHOST: [thoughtful] So...');

    const voices = turns.map((turn) => resolver.resolve(turn.speaker));

    expect(voices[0]).toBe(voices[2]);
    expect(voices[0]).not.toBe(voices[1]);
  });

  it('normalizes labels passed in by callers', () => {
    const resolver = new VoiceResolver({ format: 'podcast', roleVoices, settings });

    expect(resolver.resolve('host').voiceId).toBe('voice-host');
    expect(resolver.resolve(' co_host ')).toBe(resolver.resolve('CO-HOST'));
  });

  it('prefers overrides over the roster', () => {
    const resolver = new VoiceResolver({
      format: 'podcast',
      roleVoices,
      overrides: { HOST: 'custom-host' },
      settings,
    });

    expect(resolver.resolve('HOST').voiceId).toBe('custom-host');
  });

  it('accepts override labels in any case', () => {
    const resolver = new VoiceResolver({
      format: 'news',
      roleVoices,
      overrides: { 'guest_speaker': 'voice-guest' },
      settings,
    });

    expect(resolver.resolve('GUEST-SPEAKER').voiceId).toBe('voice-guest');
  });

  it('allows speakers outside the format roster when overridden', () => {
    const resolver = new VoiceResolver({ format: 'news', roleVoices, overrides: { GUEST: 'voice-guest' }, settings });

    expect(resolver.resolve('GUEST').voiceId).toBe('voice-guest');
  });

  it('does not borrow roles from other formats', () => {
    const resolver = new VoiceResolver({ format: 'news', roleVoices, settings });

    expect(() => resolver.resolve('HOST')).toThrow(UnknownSpeakerError);
  });

  it('reports the speaker, format and roster on failure', () => {
    const resolver = new VoiceResolver({ format: 'podcast', roleVoices, settings });

    let caught: unknown;
    try {
      resolver.resolve('GUEST', 4);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownSpeakerError);
    expect(caught).toMatchObject({
      speaker: 'GUEST',
      format: 'podcast',
      expected: ['HOST', 'CO-HOST'],
      turnIndex: 4,
    });
    expect(caught instanceof Error && caught.message).toBe(
      'No voice configured for speaker "GUEST" (turn 5) in podcast format; expected one of HOST, CO-HOST or a voice override',
    );
  });

  it('shares one identity between labels pointing at the same voice', () => {
    const resolver = new VoiceResolver({
      format: 'news',
      roleVoices,
      overrides: { HOST: 'voice-anchor' },
      settings,
    });

    expect(resolver.resolve('HOST')).toBe(resolver.resolve('ANCHOR'));
  });
});

describe('voice config', () => {
  it('builds role config keys', () => {
    expect(roleConfigKey('CO-HOST')).toBe('VOICE_CO_HOST');
    expect(roleConfigKey('NARRATOR')).toBe('VOICE_NARRATOR');
  });

  it('lets VOICE_* keys repoint roles', () => {
    const config = new ConfigService({ VOICE_CO_HOST: 'replacement' });

    const voices = getRoleVoices(config);

    expect(voices['CO-HOST']).toBe('replacement');
    expect(voices.HOST).toBe('cjVigY5qzO86Huf0OWal');
  });

  it('switches defaults with the TTS provider', () => {
    const config = new ConfigService({ TTS_PROVIDER: 'openai' });

    expect(getRoleVoices(config).HOST).toBe('alloy');
    expect(getSynthesisSettings(config)).toEqual({ model: 'gpt-4o-mini-tts', outputFormat: 'mp3' });
  });

  it('uses ElevenLabs settings by default', () => {
    expect(getSynthesisSettings(new ConfigService({}))).toEqual({
      model: 'eleven_multilingual_v2',
      outputFormat: 'mp3_44100_128',
    });
  });

  it('parses override pairs into canonical labels', () => {
    expect(parseVoiceOverrides('host=a, co_host = b ,')).toEqual({ HOST: 'a', 'CO-HOST': 'b' });
    expect(parseVoiceOverrides(['narrator=n1', 'NARRATOR=n2'])).toEqual({ NARRATOR: 'n2' });
    expect(parseVoiceOverrides(undefined)).toEqual({});
  });

  it('rejects malformed override pairs', () => {
    expect(() => parseVoiceOverrides('HOST')).toThrow('Invalid voice override "HOST"; expected LABEL=voiceId');
    expect(() => parseVoiceOverrides('=abc')).toThrow('Invalid voice override');
  });
});

describe('VoicesService', () => {
  it('layers run overrides over VOICE_OVERRIDES', () => {
    const service = new VoicesService(new ConfigService({ VOICE_OVERRIDES: 'HOST=env-host,CO-HOST=env-cohost' }));

    const resolver = service.createResolver('podcast', { host: 'cli-host' });

    expect(resolver.resolve('HOST').voiceId).toBe('cli-host');
    expect(resolver.resolve('CO-HOST').voiceId).toBe('env-cohost');
  });

  it('describes the roster of one format', () => {
    const service = new VoicesService(new ConfigService({ VOICE_OVERRIDES: 'SIDE-B=env-b' }));

    expect(service.describeAssignments('debate')).toEqual([
      { format: 'debate', role: 'MODERATOR', voiceId: 'cjVigY5qzO86Huf0OWal', overridden: false },
      { format: 'debate', role: 'SIDE-A', voiceId: 'TX3LPaxmHKxFdv7VOQHJ', overridden: false },
      { format: 'debate', role: 'SIDE-B', voiceId: 'env-b', overridden: true },
    ]);
  });
});
