import path from 'path';
import { z } from 'zod';

export const USAGE = `Usage:
  newsroom generate <topic> [--format news|podcast|debate|narrative] [--length short|medium|long]
                            [--script <file>] [--voice LABEL=voiceId]... [--best-effort]
                            [--concurrency <n>] [--output <prefix>] [--skip-research] [--dry-run] [--verbose]
  newsroom voices [--format <format>]`;

const formatSchema = z.enum(['news', 'podcast', 'debate', 'narrative']);
const lengthSchema = z.enum(['short', 'medium', 'long']);

const generateSchema = z.object({
  command: z.literal('generate'),
  topic: z.string().trim().min(1, 'a topic (or --script) is required'),
  format: formatSchema.default('news'),
  length: lengthSchema.default('medium'),
  scriptPath: z.string().min(1).optional(),
  voices: z.array(z.string()),
  bestEffort: z.boolean(),
  concurrency: z.coerce.number().int().min(1).max(16).optional(),
  output: z.string().min(1).optional(),
  skipResearch: z.boolean(),
  dryRun: z.boolean(),
  verbose: z.boolean(),
});

const voicesSchema = z.object({
  command: z.literal('voices'),
  format: formatSchema.optional(),
  verbose: z.boolean(),
});

const helpSchema = z.object({ command: z.literal('help') });

export const cliOptionsSchema = z.discriminatedUnion('command', [generateSchema, voicesSchema, helpSchema]);

export type CliOptions = z.infer<typeof cliOptionsSchema>;
export type GenerateOptions = z.infer<typeof generateSchema>;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n\n${USAGE}`);
    this.name = 'CliUsageError';
  }
}

const VALUE_FLAGS: Record<string, string> = {
  '--format': 'format',
  '-f': 'format',
  '--length': 'length',
  '-l': 'length',
  '--script': 'scriptPath',
  '-s': 'scriptPath',
  '--voice': 'voice',
  '--concurrency': 'concurrency',
  '-c': 'concurrency',
  '--output': 'output',
  '-o': 'output',
};

const BOOLEAN_FLAGS: Record<string, string> = {
  '--best-effort': 'bestEffort',
  '--skip-research': 'skipResearch',
  '--dry-run': 'dryRun',
  '--verbose': 'verbose',
  '-v': 'verbose',
};

export function parseCliArgs(argv: string[]): CliOptions {
  const values: Record<string, string> = {};
  const flags = new Set<string>();
  const voices: string[] = [];
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { command: 'help' };
    }
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=') ? splitOnce(arg, '=') : [arg, undefined];
    const valueKey = VALUE_FLAGS[flag];
    if (valueKey) {
      const value = inlineValue ?? argv[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      if (inlineValue === undefined) {
        i += 1;
      }
      if (valueKey === 'voice') {
        voices.push(value);
      } else {
        values[valueKey] = value;
      }
      continue;
    }
    if (BOOLEAN_FLAGS[flag]) {
      flags.add(BOOLEAN_FLAGS[flag]);
      continue;
    }
    if (arg.startsWith('-') && arg.length > 1) {
      throw new CliUsageError(`Unknown option ${arg}`);
    }
    positional.push(arg);
  }

  const [command, ...rest] = positional;
  let candidate: unknown;
  if (command === 'generate') {
    const scriptPath = values['scriptPath'];
    const topic = rest.join(' ').trim() || (scriptPath ? path.basename(scriptPath, path.extname(scriptPath)) : '');
    candidate = {
      command,
      topic,
      format: values['format'],
      length: values['length'],
      scriptPath,
      voices,
      bestEffort: flags.has('bestEffort'),
      concurrency: values['concurrency'],
      output: values['output'],
      skipResearch: flags.has('skipResearch'),
      dryRun: flags.has('dryRun'),
      verbose: flags.has('verbose'),
    };
  } else if (command === 'voices') {
    candidate = { command, format: values['format'], verbose: flags.has('verbose') };
  } else if (!command) {
    return { command: 'help' };
  } else {
    throw new CliUsageError(`Unknown command "${command}"`);
  }

  const parsed = cliOptionsSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CliUsageError(`Invalid arguments: ${problems.join('; ')}`);
  }
  return parsed.data;
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return [value.slice(0, index), value.slice(index + 1)];
}
