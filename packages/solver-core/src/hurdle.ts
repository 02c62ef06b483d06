// packages/solver-core/src/hurdle.ts
//
// Hurdle: a chain of Wordles where each puzzle's answer is forced as the
// opening guess of the next one. Every puzzle starts again from the full
// dictionary.

import type { CandidatePool } from './candidatePool.js';
import { SessionStateError } from './errors.js';
import { SolverSession, type SessionOptions } from './session.js';

export const DEFAULT_HURDLE_PUZZLES = 4;

export type HurdleState = 'in-progress' | 'completed' | 'failed';

export interface HurdleOptions extends Omit<SessionOptions, 'openingGuess'> {
  puzzles?: number;
}

export class HurdleRun {
  readonly puzzles: number;
  private readonly sessions: SolverSession[] = [];

  constructor(
    private readonly dictionary: CandidatePool,
    private readonly options: HurdleOptions = {},
  ) {
    const puzzles = options.puzzles ?? DEFAULT_HURDLE_PUZZLES;
    if (!Number.isInteger(puzzles) || puzzles < 1) {
      throw new RangeError(`puzzles must be a positive integer, got ${puzzles}`);
    }
    this.puzzles = puzzles;
  }

  /** 1-based number of the current puzzle; 0 before the first one starts. */
  get puzzleNumber(): number {
    return this.sessions.length;
  }

  get current(): SolverSession | null {
    return this.sessions[this.sessions.length - 1] ?? null;
  }

  get answers(): string[] {
    return this.sessions.flatMap((s) => (s.answer === null ? [] : [s.answer]));
  }

  get state(): HurdleState {
    if (this.current?.state === 'exhausted') return 'failed';
    if (this.answers.length === this.puzzles) return 'completed';
    return 'in-progress';
  }

  nextPuzzle(): SolverSession {
    const state = this.state;
    if (state !== 'in-progress') {
      throw new SessionStateError(`Hurdle run is already ${state}`);
    }
    const previous = this.current;
    if (previous && previous.answer === null) {
      throw new SessionStateError(
        `Puzzle #${this.puzzleNumber} must be solved before the next one starts`,
      );
    }

    const session = new SolverSession(this.dictionary, {
      maxAttempts: this.options.maxAttempts,
      scoring: this.options.scoring,
      openingGuess: previous?.answer ?? undefined,
    });
    this.sessions.push(session);
    return session;
  }
}
