#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { promises as fs } from 'fs';
import { AppModule } from '../src/app.module';
import { BroadcastService } from '../src/broadcasts/broadcast.service';
import { CliUsageError, GenerateOptions, parseCliArgs, USAGE } from '../src/cli/cli-options';
import { formatProgress } from '../src/cli/progress';
import { RunCancelledError } from '../src/pipeline/pipeline.errors';
import { parseVoiceOverrides } from '../src/voices/voice-config';
import { VoicesService } from '../src/voices/voices.service';

const CANCELLED_EXIT_CODE = 130;

function print(line: string) {
  process.stdout.write(`${line}\n`);
}

function logLevels(verbose: boolean): LogLevel[] {
  return verbose ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn'];
}

async function generate(
  app: INestApplicationContext,
  options: GenerateOptions,
): Promise<number> {
  const broadcastService = app.get(BroadcastService);
  const script = options.scriptPath ? await fs.readFile(options.scriptPath, 'utf8') : undefined;
  const controller = new AbortController();
  const onSigint = () => {
    print('Cancelling; waiting for in-flight turns...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await broadcastService.produce({
      topic: options.topic,
      format: options.format,
      length: options.length,
      script,
      skipResearch: options.skipResearch,
      dryRun: options.dryRun,
      outputPrefix: options.output,
      overrides: parseVoiceOverrides(options.voices),
      failurePolicy: options.bestEffort ? 'best-effort' : 'fail-fast',
      concurrency: options.concurrency,
      signal: controller.signal,
      onStage: (stage) => print(`» ${stage}`),
      onTurnSettled: (event) => print(formatProgress(event)),
    });

    print(`Script: ${result.scriptKey} (${result.summary.turnCount} turns, ${result.summary.wordCount} words)`);
    if (result.researchKey) {
      print(`Research: ${result.researchKey}`);
    }
    if (result.dryRun) {
      for (const entry of result.preview.turns) {
        const target = entry.voice ? entry.voice.voiceId : `unresolved: ${entry.problem ?? 'unknown'}`;
        print(`  ${entry.turn.index + 1}. ${entry.turn.speaker} -> ${target}`);
      }
      return 0;
    }
    for (const gap of result.gaps) {
      print(`Gap at turn ${gap.turnIndex + 1} (${gap.speaker}): ${gap.reason}`);
    }
    const duration = result.durationSeconds !== undefined ? ` (${result.durationSeconds}s)` : '';
    print(`Audio: ${result.audioUrl ?? result.audioKey ?? 'not stored'}${duration}`);
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function run(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.command === 'help') {
    print(USAGE);
    return 0;
  }

  const logger = new Logger('Newsroom');
  const app = await NestFactory.createApplicationContext(AppModule, { logger: logLevels(options.verbose) });
  try {
    if (options.command === 'voices') {
      const voicesService = app.get(VoicesService);
      for (const assignment of voicesService.describeAssignments(options.format)) {
        const marker = assignment.overridden ? ' (override)' : '';
        print(`${assignment.format.padEnd(10)} ${assignment.role.padEnd(12)} ${assignment.voiceId}${marker}`);
      }
      return 0;
    }
    return await generate(app, options);
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.warn(error.message);
      return CANCELLED_EXIT_CODE;
    }
    throw error;
  } finally {
    await app.close();
  }
}

run()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof CliUsageError ? error.message : error);
    process.exit(1);
  });
