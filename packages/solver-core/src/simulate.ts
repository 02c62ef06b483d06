// packages/solver-core/src/simulate.ts
//
// Plays a session against a known answer, using scoreGuess as the feedback
// oracle. Handy for checking the heuristic end-to-end and for the CLI's
// non-interactive mode.

import type { CandidatePool } from './candidatePool.js';
import { InvalidFeedbackError } from './errors.js';
import { scoreGuess } from './scoring.js';
import { SolverSession, type SessionOptions, type Turn } from './session.js';
import { isWord, normalizeWord } from './words.js';

export interface SimulationResult {
  success: boolean;
  answer: string;
  steps: Turn[];
}

/**
 * Runs the solver until it finds `answer` or runs out of attempts.
 * An answer that is not a word of the pool's length throws
 * InvalidFeedbackError before any guess is made.
 * An answer missing from the pool eventually empties it, and the next
 * suggestion throws NoCandidatesError.
 */
export function simulate(
  pool: CandidatePool,
  answer: string,
  options: SessionOptions = {},
): SimulationResult {
  const target = normalizeWord(answer);
  if (!isWord(target, pool.wordLength)) {
    throw new InvalidFeedbackError(
      `Answer "${answer}" is not a ${pool.wordLength}-letter word`,
    );
  }
  const session = new SolverSession(pool, options);

  while (session.state === 'awaiting-guess') {
    const guess = session.submitGuess();
    session.applyFeedback(scoreGuess(target, guess));
  }

  return {
    success: session.state === 'solved',
    answer: target,
    steps: [...session.history],
  };
}
