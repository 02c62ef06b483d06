// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// Re-exports all solver logic so consumers can import from one place.
//
// Includes:
//   • candidatePool.ts → CandidatePool (dictionary + feedback filtering)
//   • ranker.ts        → FrequencyRanker (positional frequency scoring)
//   • scoring.ts       → Mark type and scoreGuess
//   • session.ts       → SolverSession state machine
//   • hurdle.ts        → HurdleRun (chained puzzles)
//   • simulate.ts      → simulate (self-play against a known answer)
//   • errors.ts        → SolverError and its subclasses
//
// Example usage:
//   import { CandidatePool, FrequencyRanker } from '@freqsolve/solver-core';

export * from './errors.js';
export * from './words.js';
export * from './scoring.js';
export * from './constraints.js';
export * from './candidatePool.js';
export * from './ranker.js';
export * from './session.js';
export * from './hurdle.js';
export * from './simulate.js';
