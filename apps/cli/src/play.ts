// apps/cli/src/play.ts
//
// Interactive loops for Wordle and Hurdle. Terminal access goes through the
// small TerminalIO interface so the loops can be driven by scripted input.
//
// Player-facing text goes to io.print; diagnostics go to the pino logger.

import type { Logger } from 'pino';

import type { HurdleRun, SolverSession } from '@freqsolve/solver-core';
import { feedbackInput, formatFeedback, type Mark } from '@freqsolve/protocol';

export interface TerminalIO {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

/** Remaining words are listed once the pool is at most this size. */
const LIST_THRESHOLD = 10;

const RULE = '='.repeat(50);

async function readFeedback(
  io: TerminalIO,
  length: number,
): Promise<Mark[] | 'quit'> {
  const schema = feedbackInput(length);
  for (;;) {
    const raw = await io.ask(
      'Enter result (G/Y/B for each position, or q to quit): ',
    );
    if (raw.trim().toLowerCase() === 'q') return 'quit';
    const parsed = schema.safeParse(raw);
    if (parsed.success) return parsed.data;
    io.print(`Invalid result. ${parsed.error.issues[0]?.message ?? ''}`.trim());
  }
}

/**
 * Plays one puzzle to the end.
 * @returns the answer when solved, otherwise null (quit, exhausted or
 *          contradictory feedback)
 */
export async function playWordle(
  session: SolverSession,
  io: TerminalIO,
  log: Logger,
): Promise<string | null> {
  const length = session.candidates.wordLength;
  io.print(`Starting with ${session.candidates.size()} possible words`);

  while (session.state === 'awaiting-guess') {
    const attempt = session.attemptsUsed + 1;
    const remaining = session.candidates.size();
    const guess = session.submitGuess();

    io.print('');
    io.print(`Attempt ${attempt}: Try '${guess}' (score: ${Math.round(session.scoreOf(guess))})`);
    io.print(`Remaining possibilities: ${remaining}`);

    const feedback = await readFeedback(io, length);
    if (feedback === 'quit') {
      log.info({ attempt }, 'player quit');
      return null;
    }

    const state = session.applyFeedback(feedback);
    log.debug(
      { attempt, guess, feedback: formatFeedback(feedback), remaining: session.candidates.size() },
      'feedback applied',
    );

    if (state === 'solved') {
      io.print(`Solved in ${attempt} attempts! Answer: ${guess}`);
      return guess;
    }
    if (session.candidates.isEmpty()) {
      log.warn({ history: session.history.length }, 'feedback contradicts every word');
      io.print('No possible words remaining. Check your inputs.');
      return null;
    }
    if (session.candidates.size() <= LIST_THRESHOLD) {
      io.print(`Remaining words: ${session.candidates.toArray().join(', ')}`);
    }
  }

  io.print(`Failed to solve in ${session.maxAttempts} attempts`);
  return null;
}

/** Plays every puzzle of a Hurdle run; true when all are solved. */
export async function playHurdle(
  run: HurdleRun,
  io: TerminalIO,
  log: Logger,
): Promise<boolean> {
  io.print(RULE);
  io.print(`HURDLE SOLVER - ${run.puzzles} SEQUENTIAL PUZZLES`);
  io.print(RULE);

  while (run.state === 'in-progress') {
    const session = run.nextPuzzle();
    const puzzle = run.puzzleNumber;

    io.print('');
    io.print(RULE);
    io.print(`PUZZLE #${puzzle}`);
    io.print(RULE);
    if (session.openingGuess !== null) {
      io.print(`Forced first guess: ${session.openingGuess}`);
    }

    const answer = await playWordle(session, io, log);
    if (answer === null) {
      log.info({ puzzle }, 'hurdle failed');
      io.print(`HURDLE FAILED at puzzle #${puzzle}`);
      return false;
    }

    if (puzzle < run.puzzles) {
      io.print(`Next puzzle will start with: ${answer}`);
      await io.ask('Press Enter to continue to next puzzle...');
    }
  }

  log.info({ answers: run.answers }, 'hurdle completed');
  io.print('');
  io.print(RULE);
  io.print('HURDLE COMPLETED! All puzzles solved!');
  io.print(RULE);
  return true;
}
