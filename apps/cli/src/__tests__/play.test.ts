// apps/cli/src/__tests__/play.test.ts
//
// Drives the interactive loops with scripted answers and checks what the
// player would see. Fixture pool as in the core session tests: TRACE opens
// with score 17, and feedback BGGGG leaves only GRACE.

import pino from 'pino';

import { CandidatePool, HurdleRun, SolverSession } from '@freqsolve/solver-core';

import { playHurdle, playWordle, type TerminalIO } from '../play.js';

const log = pino({ level: 'silent' });
const dictionary = CandidatePool.initialize(['CRANE', 'TRACE', 'SLATE', 'GRACE', 'BRAKE']);

function scripted(answers: string[]) {
  const queue = [...answers];
  const printed: string[] = [];
  const prompts: string[] = [];
  const io: TerminalIO = {
    ask: async (question) => {
      prompts.push(question);
      const next = queue.shift();
      if (next === undefined) throw new Error(`unexpected prompt: ${question}`);
      return next;
    },
    print: (line) => {
      printed.push(line);
    },
  };
  return { io, printed, prompts };
}

describe('playWordle', () => {
  it('suggests, applies feedback and reports the solve', async () => {
    const { io, printed, prompts } = scripted(['bgggg', 'GGGGG']);
    const answer = await playWordle(new SolverSession(dictionary), io, log);

    expect(answer).toBe('GRACE');
    expect(printed).toEqual([
      'Starting with 5 possible words',
      '',
      "Attempt 1: Try 'TRACE' (score: 17)",
      'Remaining possibilities: 5',
      'Remaining words: GRACE',
      '',
      "Attempt 2: Try 'GRACE' (score: 5)",
      'Remaining possibilities: 1',
      'Solved in 2 attempts! Answer: GRACE',
    ]);
    expect(prompts).toEqual([
      'Enter result (G/Y/B for each position, or q to quit): ',
      'Enter result (G/Y/B for each position, or q to quit): ',
    ]);
  });

  it('asks again after invalid feedback', async () => {
    const { io, printed } = scripted(['gg', 'bgxgg', 'bgggg', 'ggggg']);
    await playWordle(new SolverSession(dictionary), io, log);
    expect(printed).toContain('Invalid result. Result must be 5 characters');
    expect(printed).toContain('Invalid result. Use only G, Y or B for each position');
  });

  it('returns null when the player quits', async () => {
    const { io, printed } = scripted([' Q ']);
    expect(await playWordle(new SolverSession(dictionary), io, log)).toBeNull();
    expect(printed[printed.length - 1]).toBe('Remaining possibilities: 5');
  });

  it('stops when feedback contradicts every word', async () => {
    const { io, printed } = scripted(['bbbbb']);
    expect(await playWordle(new SolverSession(dictionary), io, log)).toBeNull();
    expect(printed[printed.length - 1]).toBe(
      'No possible words remaining. Check your inputs.',
    );
  });

  it('reports failure when attempts run out', async () => {
    const { io, printed } = scripted(['bgggg']);
    const session = new SolverSession(dictionary, { maxAttempts: 1 });
    expect(await playWordle(session, io, log)).toBeNull();
    expect(printed.slice(-2)).toEqual([
      'Remaining words: GRACE',
      'Failed to solve in 1 attempts',
    ]);
  });
});

describe('playHurdle', () => {
  it('chains answers into the next puzzle', async () => {
    const { io, printed, prompts } = scripted([
      'bgggg', 'ggggg', // puzzle 1: TRACE, GRACE
      '',               // continue
      'bggbg', 'ggggg', // puzzle 2: GRACE (forced), BRAKE
    ]);
    const run = new HurdleRun(dictionary, { puzzles: 2 });

    expect(await playHurdle(run, io, log)).toBe(true);
    expect(run.answers).toEqual(['GRACE', 'BRAKE']);
    expect(printed).toContain('HURDLE SOLVER - 2 SEQUENTIAL PUZZLES');
    expect(printed).toContain('Next puzzle will start with: GRACE');
    expect(printed).toContain('Forced first guess: GRACE');
    expect(printed).toContain("Attempt 1: Try 'GRACE' (score: 17)");
    expect(printed).toContain('Solved in 2 attempts! Answer: BRAKE');
    expect(printed[printed.length - 2]).toBe('HURDLE COMPLETED! All puzzles solved!');
    expect(prompts).toContain('Press Enter to continue to next puzzle...');
  });

  it('reports the puzzle that failed', async () => {
    const { io, printed } = scripted(['q']);
    const run = new HurdleRun(dictionary, { puzzles: 3 });
    expect(await playHurdle(run, io, log)).toBe(false);
    expect(printed[printed.length - 1]).toBe('HURDLE FAILED at puzzle #1');
  });
});
