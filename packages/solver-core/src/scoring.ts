// packages/solver-core/src/scoring.ts
//
// Feedback marks and the scoring algorithm that produces them.
// Implements the standard two-pass algorithm to evaluate a guess
// against a known answer, for any word length.
//
// Mark legend:
//   - "green":  correct letter, correct position
//   - "yellow": correct letter, wrong position
//   - "black":  no further occurrence of the letter in the answer
//
// Rules:
//   • Both words must have the same length and contain only A–Z;
//     otherwise InvalidFeedbackError is thrown.
//   • Input is normalised to upper case before comparison.
//   • Repeated letters are handled by counting the non-green answer letters
//     and decrementing counts as yellows are handed out.

import { InvalidFeedbackError } from './errors.js';
import { isWord, normalizeWord } from './words.js';

export type Mark = 'green' | 'yellow' | 'black';

export function isMark(value: unknown): value is Mark {
  return value === 'green' || value === 'yellow' || value === 'black';
}

export function isSolved(marks: readonly Mark[]): boolean {
  return marks.length > 0 && marks.every((m) => m === 'green');
}

/**
 * scoreGuess compares a guess against the answer and produces a per-letter evaluation.
 *
 * @param answer - the word being guessed at
 * @param guess  - the guessed word, same length as `answer`
 * @returns      - one mark per position
 *
 * Example:
 *   answer = "ERASE", guess = "SPEED"
 *   → ["yellow", "black", "yellow", "yellow", "black"]
 */
export function scoreGuess(answer: string, guess: string): Mark[] {
  const A = normalizeWord(answer);
  const G = normalizeWord(guess);

  if (A.length !== G.length) {
    throw new InvalidFeedbackError('Words must be the same length');
  }
  if (!isWord(A, A.length) || !isWord(G, G.length)) {
    throw new InvalidFeedbackError('Only A–Z letters allowed');
  }

  const marks: Mark[] = Array<Mark>(G.length).fill('black');
  const counts: Record<string, number> = {};

  // Pass 1: greens, and count the answer letters they don't consume
  for (let i = 0; i < G.length; i++) {
    if (G[i] === A[i]) {
      marks[i] = 'green';
    } else {
      counts[A[i]] = (counts[A[i]] ?? 0) + 1;
    }
  }

  // Pass 2: yellows from the remaining counts
  for (let i = 0; i < G.length; i++) {
    if (marks[i] === 'green') continue;
    const c = G[i];
    if ((counts[c] ?? 0) > 0) {
      marks[i] = 'yellow';
      counts[c]--;
    }
  }

  return marks;
}
