// apps/cli/src/cli.ts
//
// Command handling behind the entry point: option parsers, the simulation
// and interactive runs, and the mapping from SolverError to an exit code.
// Everything the process owns (config, logger, terminal) is passed in.

import { InvalidArgumentError } from 'commander';
import type { Logger } from 'pino';

import {
  HurdleRun,
  SolverError,
  SolverSession,
  simulate,
} from '@freqsolve/solver-core';
import { formatFeedback, modeSchema, type Mode } from '@freqsolve/protocol';

import type { Config } from './config.js';
import { loadDictionary } from './dictionary.js';
import { playHurdle, playWordle, type TerminalIO } from './play.js';

export interface CliOptions {
  mode?: Mode;
  words?: string;
  length?: number;
  maxAttempts?: number;
  puzzles?: number;
  answer?: string;
}

export interface CliContext {
  config: Config;
  io: TerminalIO;
  log: Logger;
}

export function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parseMode(value: string): Mode {
  const parsed = modeSchema.safeParse(value);
  if (!parsed.success) throw new InvalidArgumentError('Must be "wordle" or "hurdle".');
  return parsed.data;
}

async function chooseMode(io: TerminalIO, flag?: Mode): Promise<Mode> {
  if (flag !== undefined) return flag;
  for (;;) {
    const parsed = modeSchema.safeParse(
      await io.ask('Choose game mode (wordle/hurdle): '),
    );
    if (parsed.success) return parsed.data;
    io.print('Please enter "wordle" or "hurdle".');
  }
}

async function run(options: CliOptions, { config, io, log }: CliContext): Promise<void> {
  const wordLength = options.length ?? config.WORD_LENGTH;
  const maxAttempts = options.maxAttempts ?? config.MAX_ATTEMPTS;
  const dictionary = loadDictionary(
    { wordsFile: options.words ?? config.WORDS_FILE, wordLength },
    log,
  );

  if (options.answer !== undefined) {
    const result = simulate(dictionary, options.answer, { maxAttempts });
    result.steps.forEach((step, i) => {
      io.print(`${i + 1}. ${step.guess} ${formatFeedback(step.feedback)} (${step.remaining} left)`);
    });
    io.print(
      result.success
        ? `Solved ${result.answer} in ${result.steps.length} attempts`
        : `Did not solve ${result.answer} in ${maxAttempts} attempts`,
    );
    return;
  }

  const mode = await chooseMode(io, options.mode);
  log.info({ mode, wordLength, maxAttempts }, 'session start');
  if (mode === 'wordle') {
    await playWordle(new SolverSession(dictionary, { maxAttempts }), io, log);
  } else {
    const hurdle = new HurdleRun(dictionary, {
      maxAttempts,
      puzzles: options.puzzles ?? config.HURDLE_PUZZLES,
    });
    await playHurdle(hurdle, io, log);
  }
}

/**
 * Runs one command. Solver errors are logged with their code and give exit
 * code 1; any other error propagates.
 */
export async function runCli(options: CliOptions, ctx: CliContext): Promise<number> {
  try {
    await run(options, ctx);
    return 0;
  } catch (err) {
    if (err instanceof SolverError) {
      ctx.log.error({ code: err.code }, err.message);
      return 1;
    }
    throw err;
  }
}
