// apps/cli/src/index.ts
//
// Terminal front end for the frequency solver.
//
// Responsibilities:
//   • Read configuration (.env + environment, overridden by flags).
//   • Wire the logger and the terminal, then hand off to runCli, which
//     loads the dictionary and plays (or simulates with --answer).

import 'dotenv/config';
import { Command } from 'commander';
import pino from 'pino';
import { createInterface } from 'node:readline/promises';

import { parseMode, positiveInt, runCli, type CliOptions } from './cli.js';
import { loadConfig } from './config.js';
import type { TerminalIO } from './play.js';

const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL }, pino.destination(2));

const program = new Command()
  .name('freqsolve')
  .description('Suggests Wordle and Hurdle guesses from positional letter frequencies')
  .option('-m, --mode <mode>', 'game mode: wordle or hurdle', parseMode)
  .option('-w, --words <file>', 'JSON word list (default: WORDS_FILE or bundled list)')
  .option('-l, --length <n>', 'word length', positiveInt)
  .option('-a, --max-attempts <n>', 'guesses allowed per puzzle', positiveInt)
  .option('-p, --puzzles <n>', 'puzzles in a Hurdle run', positiveInt)
  .option('--answer <word>', 'simulate a game against a known answer')
  .action(async (options: CliOptions) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const io: TerminalIO = {
      ask: (question) => rl.question(question),
      print: (line) => {
        process.stdout.write(`${line}\n`);
      },
    };
    try {
      process.exitCode = await runCli(options, { config, io, log });
    } finally {
      rl.close();
    }
  });

await program.parseAsync(process.argv);
