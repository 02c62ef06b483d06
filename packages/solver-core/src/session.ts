// packages/solver-core/src/session.ts
//
// SolverSession: one puzzle, from the full dictionary to solved/exhausted.
//
//   awaiting-guess ──submitGuess──▶ guess-submitted ──applyFeedback──▶
//       ▲                                                  │
//       └──────────── not solved, attempts left ───────────┤
//                                                          ├─▶ solved
//                                                          └─▶ exhausted
//
// The session owns its pool; each applied record replaces it with the
// filtered pool. Nothing is shared between sessions.

import type { CandidatePool } from './candidatePool.js';
import { InvalidFeedbackError, SessionStateError } from './errors.js';
import {
  buildFrequencyTable,
  score,
  suggest,
  type ScoreOptions,
} from './ranker.js';
import { isSolved, type Mark } from './scoring.js';
import { isWord, normalizeWord } from './words.js';

export const DEFAULT_MAX_ATTEMPTS = 6;

export type SessionState =
  | 'awaiting-guess'
  | 'guess-submitted'
  | 'solved'
  | 'exhausted';

export interface SessionOptions {
  maxAttempts?: number;
  /** Forced first guess (Hurdle: the previous puzzle's answer). */
  openingGuess?: string;
  scoring?: ScoreOptions;
}

export interface Turn {
  guess: string;
  feedback: Mark[];
  /** Pool size after this turn's feedback was applied. */
  remaining: number;
}

export class SolverSession {
  readonly maxAttempts: number;
  readonly openingGuess: string | null;
  private readonly scoring: ScoreOptions;
  private pool: CandidatePool;
  private current: SessionState = 'awaiting-guess';
  private pending: string | null = null;
  private readonly turns: Turn[] = [];

  constructor(pool: CandidatePool, options: SessionOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    this.pool = pool;
    this.maxAttempts = maxAttempts;
    this.scoring = options.scoring ?? {};
    this.openingGuess =
      options.openingGuess === undefined
        ? null
        : this.checkGuess(options.openingGuess);
  }

  get state(): SessionState {
    return this.current;
  }

  get candidates(): CandidatePool {
    return this.pool;
  }

  get history(): readonly Turn[] {
    return this.turns;
  }

  get attemptsUsed(): number {
    return this.turns.length;
  }

  get pendingGuess(): string | null {
    return this.pending;
  }

  /** The solved word, or null while unsolved. */
  get answer(): string | null {
    return this.current === 'solved' ? this.turns[this.turns.length - 1].guess : null;
  }

  /** Next word to play. Throws NoCandidatesError on an empty pool. */
  suggest(): string {
    this.expect('awaiting-guess', 'suggest');
    if (this.turns.length === 0 && this.openingGuess !== null) {
      return this.openingGuess;
    }
    return suggest(this.pool, this.scoring);
  }

  scoreOf(word: string): number {
    return score(word, buildFrequencyTable(this.pool), this.scoring);
  }

  submitGuess(guess?: string): string {
    this.expect('awaiting-guess', 'submitGuess');
    const word = guess === undefined ? this.suggest() : this.checkGuess(guess);
    this.pending = word;
    this.current = 'guess-submitted';
    return word;
  }

  applyFeedback(feedback: readonly Mark[]): SessionState {
    this.expect('guess-submitted', 'applyFeedback');
    const guess = this.pending ?? '';
    // filter validates the record; on error nothing below runs
    const next = this.pool.filter(guess, feedback);

    this.pool = next;
    this.pending = null;
    this.turns.push({ guess, feedback: [...feedback], remaining: next.size() });

    if (isSolved(feedback)) this.current = 'solved';
    else if (this.turns.length >= this.maxAttempts) this.current = 'exhausted';
    else this.current = 'awaiting-guess';
    return this.current;
  }

  private checkGuess(raw: string): string {
    const word = normalizeWord(raw);
    if (!isWord(word, this.pool.wordLength)) {
      throw new InvalidFeedbackError(
        `Guess "${raw}" is not a ${this.pool.wordLength}-letter word`,
      );
    }
    return word;
  }

  private expect(state: SessionState, action: string): void {
    if (this.current !== state) {
      throw new SessionStateError(
        `Cannot ${action} while session is ${this.current}`,
      );
    }
  }
}
