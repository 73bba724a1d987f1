import { CliUsageError, parseCliArgs } from './cli-options';
import { formatProgress } from './progress';

describe('parseCliArgs', () => {
  it('parses a generate command with repeatable voices', () => {
    const options = parseCliArgs([
      'generate',
      'Tidal',
      'Power',
      '-f',
      'podcast',
      '--voice',
      'HOST=v1',
      '--voice=co_host=v2',
      '--best-effort',
      '--concurrency',
      '3',
    ]);

    expect(options).toEqual({
      command: 'generate',
      topic: 'Tidal Power',
      format: 'podcast',
      length: 'medium',
      scriptPath: undefined,
      voices: ['HOST=v1', 'co_host=v2'],
      bestEffort: true,
      concurrency: 3,
      output: undefined,
      skipResearch: false,
      dryRun: false,
      verbose: false,
    });
  });

  it('takes the topic from the script file name when none is given', () => {
    const options = parseCliArgs(['generate', '--script', 'drafts/tidal-power.txt', '--dry-run', '-l', 'short']);

    expect(options).toMatchObject({
      command: 'generate',
      topic: 'tidal-power',
      scriptPath: 'drafts/tidal-power.txt',
      length: 'short',
      format: 'news',
      dryRun: true,
    });
  });

  it('parses the voices command', () => {
    expect(parseCliArgs(['voices', '--format', 'debate'])).toEqual({
      command: 'voices',
      format: 'debate',
      verbose: false,
    });
  });

  it('falls back to help', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['generate', '--help'])).toEqual({ command: 'help' });
  });

  it.each([
    [['generate'], 'Invalid arguments: topic: a topic (or --script) is required'],
    [['generate', 'x', '--format'], 'Missing value for --format'],
    [['generate', 'x', '--loud'], 'Unknown option --loud'],
    [['render', 'x'], 'Unknown command "render"'],
    [['generate', 'x', '--concurrency', '0'], 'Invalid arguments: concurrency:'],
    [['generate', 'x', '-f', 'radio'], 'Invalid arguments: format:'],
  ])('rejects %j', (argv, message) => {
    const attempt = () => parseCliArgs(argv);

    expect(attempt).toThrow(CliUsageError);
    expect(attempt).toThrow(message);
  });
});

describe('formatProgress', () => {
  it('prints the turn position, speaker and leading tag', () => {
    expect(
      formatProgress({ turnIndex: 1, totalTurns: 5, speaker: 'CO-HOST', leadingTag: 'laughing', state: 'done' }),
    ).toBe('[2/5] CO-HOST [laughing]');
  });

  it('marks turns that did not complete', () => {
    expect(formatProgress({ turnIndex: 4, totalTurns: 5, speaker: 'GUEST', state: 'skipped' })).toBe(
      '[5/5] GUEST (skipped)',
    );
  });
});
