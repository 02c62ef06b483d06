// packages/solver-core/src/errors.ts
//
// Error types thrown by the solver core. Every error carries a stable `code`
// so callers (the CLI, tests) can branch without matching on messages.

export type SolverErrorCode =
  | 'INVALID_DICTIONARY'
  | 'INVALID_FEEDBACK'
  | 'NO_CANDIDATES'
  | 'INVALID_SESSION_STATE';

export class SolverError extends Error {
  constructor(message: string, public readonly code: SolverErrorCode) {
    super(message);
    this.name = 'SolverError';
  }
}

/** Dictionary is empty, or holds words of the wrong length or alphabet. */
export class InvalidDictionaryError extends SolverError {
  constructor(message: string) {
    super(message, 'INVALID_DICTIONARY');
    this.name = 'InvalidDictionaryError';
  }
}

/** Guess or marks don't match the session word length, or a mark is unknown. */
export class InvalidFeedbackError extends SolverError {
  constructor(message: string) {
    super(message, 'INVALID_FEEDBACK');
    this.name = 'InvalidFeedbackError';
  }
}

/** A suggestion was requested from an empty pool. */
export class NoCandidatesError extends SolverError {
  constructor(message = 'No candidate words remain') {
    super(message, 'NO_CANDIDATES');
    this.name = 'NoCandidatesError';
  }
}

export class SessionStateError extends SolverError {
  constructor(message: string) {
    super(message, 'INVALID_SESSION_STATE');
    this.name = 'SessionStateError';
  }
}
