import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FakeTtsProvider, noWait } from '../../test/helpers/fake-tts.provider';
import { RecordingAudioJoiner } from '../../test/helpers/recording-audio-joiner';
import { testingConfigModule } from '../../test/helpers/testing-config';
import { AUDIO_JOINER_TOKEN } from '../audio/audio-joiner';
import { SCRIPT_WRITER_TOKEN } from '../llm/llm.constants';
import { ScriptWriter } from '../llm/llm.provider';
import { ScriptRequest } from '../llm/llm.types';
import { PerplexityService, ResearchNotes } from '../research/perplexity.service';
import { createRetryPolicy } from '../tts/retry-policy';
import { SEGMENT_GENERATOR_OPTIONS, TTS_PROVIDER_TOKEN } from '../tts/tts.constants';
import { UnknownSpeakerError } from '../voices/voices.errors';
import { BroadcastService } from './broadcast.service';
import { BroadcastStage } from './broadcast.types';
import { BroadcastsModule } from './broadcasts.module';
import { outputPrefixFor, slugify } from './broadcast.utils';

const LIVE_NOTES: ResearchNotes = {
  topic: 'Tidal Power',
  answer: 'Turbines are in trials.',
  citations: [],
  live: true,
  markdown: '# Research: Tidal Power\n\nTurbines are in trials.',
};

describe('slugify', () => {
  it('lowercases and hyphenates', () => {
    expect(slugify('  Tidal Power: What Next? ')).toBe('tidal-power-what-next');
  });

  it('falls back when nothing usable is left', () => {
    expect(slugify('???')).toBe('broadcast');
  });

  it('uses a custom prefix when given', () => {
    expect(outputPrefixFor('Tidal Power', 'news', '/runs/today/')).toBe('runs/today');
    expect(outputPrefixFor('Tidal Power', 'news')).toBe('tidal-power/news');
  });
});

describe('BroadcastService', () => {
  let root: string;
  let provider: FakeTtsProvider;
  let joiner: RecordingAudioJoiner;
  let writerRequests: ScriptRequest[];
  let writerOutput: string;
  let research: jest.Mock<Promise<ResearchNotes>, [string]>;
  let service: BroadcastService;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'broadcast-spec-'));
    provider = new FakeTtsProvider();
    joiner = new RecordingAudioJoiner();
    writerRequests = [];
    writerOutput = 'HOST: [excited] Hi!\nCO-HOST: Hey!';
    research = jest.fn(async (_topic: string) => LIVE_NOTES);
    const writer: ScriptWriter = {
      name: 'stub',
      generateScript: async (request) => {
        writerRequests.push(request);
        return writerOutput;
      },
    };

    const moduleRef = await Test.createTestingModule({
      imports: [testingConfigModule({ STORAGE_DRIVER: 'local', STORAGE_LOCAL_DIR: root }), BroadcastsModule],
    })
      .overrideProvider(TTS_PROVIDER_TOKEN)
      .useValue(provider)
      .overrideProvider(AUDIO_JOINER_TOKEN)
      .useValue(joiner)
      .overrideProvider(SEGMENT_GENERATOR_OPTIONS)
      .useValue({ retryPolicy: createRetryPolicy({ sleep: noWait }), chunkCharLimit: 4000, historySize: 3 })
      .overrideProvider(SCRIPT_WRITER_TOKEN)
      .useValue(writer)
      .overrideProvider(PerplexityService)
      .useValue({ research })
      .compile();
    service = moduleRef.get(BroadcastService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('renders a provided script without research or generation', async () => {
    const stages: BroadcastStage[] = [];

    const result = await service.produce({
      topic: 'Tidal Power',
      format: 'podcast',
      script: 'HOST: One.\nCO-HOST: Two.',
      onStage: (stage) => stages.push(stage),
    });

    expect(stages).toEqual(['script', 'parse', 'synthesize', 'measure', 'store']);
    expect(research).not.toHaveBeenCalled();
    expect(writerRequests).toEqual([]);
    expect(result).toMatchObject({
      prefix: 'tidal-power/podcast',
      scriptKey: 'tidal-power/podcast/script.txt',
      audioKey: 'tidal-power/podcast/final.mp3',
      summary: { turnCount: 2, wordCount: 2, speakers: ['CO-HOST', 'HOST'] },
      gaps: [],
      dryRun: false,
    });
    expect(await fs.readFile(path.join(root, 'tidal-power/podcast/final.mp3'), 'utf8')).toBe('One.|Two.|');
    expect(await fs.readFile(path.join(root, 'tidal-power/podcast/script.txt'), 'utf8')).toBe(
      'HOST: One.\nCO-HOST: Two.',
    );
  });

  it('researches, writes the script and stops at a dry run', async () => {
    const stages: BroadcastStage[] = [];

    const result = await service.produce({
      topic: 'Tidal Power',
      format: 'podcast',
      length: 'short',
      dryRun: true,
      onStage: (stage) => stages.push(stage),
    });

    expect(stages).toEqual(['research', 'script', 'parse', 'dry_run']);
    expect(writerRequests).toEqual([
      { topic: 'Tidal Power', format: 'podcast', length: 'short', notes: LIVE_NOTES.markdown },
    ]);
    expect(result.dryRun).toBe(true);
    expect(result.researchKey).toBe('tidal-power/podcast/research.md');
    expect(result.audioKey).toBeUndefined();
    expect(result.preview.turns.map((entry) => entry.voice?.voiceId)).toEqual(['voice-host', 'voice-cohost']);
    expect(provider.calls).toHaveLength(0);
  });

  it('skips research when asked', async () => {
    await service.produce({ topic: 'Tidal Power', format: 'podcast', skipResearch: true, dryRun: true });

    expect(research).not.toHaveBeenCalled();
    expect(writerRequests[0].notes).toBe('Topic: Tidal Power\nNo research gathered.');
    expect(writerRequests[0].length).toBe('medium');
  });

  it('logs the failing stage and rethrows', async () => {
    const errorLog = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    writerOutput = 'HOST: Hi.\nGUEST: Hello.';

    await expect(service.produce({ topic: 'Tidal Power', format: 'podcast' })).rejects.toBeInstanceOf(
      UnknownSpeakerError,
    );
    expect(errorLog).toHaveBeenCalledWith(
      'Failed to produce broadcast at parse: No voice configured for speaker "GUEST" (turn 2) in podcast format; expected one of HOST, CO-HOST or a voice override',
    );
    expect(provider.calls).toHaveLength(0);
  });
});
