// packages/solver-core/src/__tests__/simulate.test.ts

import {
  CandidatePool,
  InvalidFeedbackError,
  NoCandidatesError,
  SolverError,
  simulate,
} from '../index.js';

const words = ['CRANE', 'TRACE', 'SLATE', 'GRACE', 'BRAKE'];
const pool = CandidatePool.initialize(words);

describe('simulate', () => {
  it('solves GRACE in two guesses', () => {
    const result = simulate(pool, 'grace');
    expect(result.success).toBe(true);
    expect(result.answer).toBe('GRACE');
    expect(result.steps.map((s) => s.guess)).toEqual(['TRACE', 'GRACE']);
    expect(result.steps[0].remaining).toBe(1);
  });

  it('solves every dictionary word within six guesses', () => {
    for (const answer of words) {
      const result = simulate(pool, answer);
      expect(result.success).toBe(true);
      expect(result.steps.length).toBeLessThanOrEqual(6);
    }
  });

  it('reports failure when attempts run out', () => {
    const result = simulate(pool, 'GRACE', { maxAttempts: 1 });
    expect(result.success).toBe(false);
    expect(result.steps).toHaveLength(1);
  });

  it('rejects an answer of the wrong length before playing', () => {
    expect(() => simulate(pool, 'CAT')).toThrow(
      'Answer "CAT" is not a 5-letter word',
    );
    expect(() => simulate(pool, 'CAT')).toThrow(SolverError);
  });

  it('rejects an answer with non-letters', () => {
    expect(() => simulate(pool, 'CR4NE')).toThrow(InvalidFeedbackError);
  });

  it('throws once an answer outside the pool empties it', () => {
    expect(() => simulate(pool, 'PLANT')).toThrow(NoCandidatesError);
  });
});
