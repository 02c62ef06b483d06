// packages/solver-core/src/ranker.ts
//
// FrequencyRanker: positional letter-frequency heuristic.
//
// The table holds, for every position, how many pool words carry each letter
// there. A word's score is the sum of its letters' counts at their own
// positions, so the best guess is the word that "looks most like" the rest
// of the pool. The table is rebuilt from scratch for every pool; pools are
// small enough that incremental updates buy nothing.
//
// Exports:
//   • buildFrequencyTable / frequencyAt  → counting
//   • score / rank / rankWithScores      → scoring and ordering
//   • suggest                            → best next guess
//   • FrequencyRanker                    → the above grouped as one object

import type { CandidatePool } from './candidatePool.js';
import { NoCandidatesError } from './errors.js';
import { normalizeWord } from './words.js';

/** One map per position: letter → number of pool words with that letter there. */
export type FrequencyTable = ReadonlyArray<ReadonlyMap<string, number>>;

export interface ScoreOptions {
  /**
   * Multiplier for the second and later occurrences of a letter within a
   * word. 1 (default) counts every position in full; 0.5 halves repeats.
   */
  repeatWeight?: number;
}

export interface RankedWord {
  word: string;
  score: number;
}

export function buildFrequencyTable(pool: CandidatePool): FrequencyTable {
  const table = Array.from(
    { length: pool.wordLength },
    () => new Map<string, number>(),
  );
  for (const word of pool) {
    for (let pos = 0; pos < word.length; pos++) {
      const ch = word[pos];
      table[pos].set(ch, (table[pos].get(ch) ?? 0) + 1);
    }
  }
  return table;
}

export function frequencyAt(
  table: FrequencyTable,
  position: number,
  letter: string,
): number {
  return table[position]?.get(letter.toUpperCase()) ?? 0;
}

export function score(
  word: string,
  table: FrequencyTable,
  options: ScoreOptions = {},
): number {
  const repeatWeight = options.repeatWeight ?? 1;
  const w = normalizeWord(word);
  const seen = new Set<string>();
  let total = 0;
  for (let pos = 0; pos < w.length; pos++) {
    const ch = w[pos];
    const count = frequencyAt(table, pos, ch);
    total += seen.has(ch) ? count * repeatWeight : count;
    seen.add(ch);
  }
  return total;
}

/**
 * Scores every pool word and orders them best-first. Equal scores keep the
 * pool's (dictionary) order; Array.prototype.sort is stable.
 */
export function rankWithScores(
  pool: CandidatePool,
  table: FrequencyTable,
  options: ScoreOptions = {},
): RankedWord[] {
  return pool
    .toArray()
    .map((word) => ({ word, score: score(word, table, options) }))
    .sort((a, b) => b.score - a.score);
}

export function rank(
  pool: CandidatePool,
  table: FrequencyTable,
  options: ScoreOptions = {},
): string[] {
  return rankWithScores(pool, table, options).map((r) => r.word);
}

/**
 * suggest returns the highest-scoring word of the pool.
 *
 * @throws NoCandidatesError when the pool is empty, which means the feedback
 *         supplied so far contradicts every dictionary word.
 */
export function suggest(pool: CandidatePool, options: ScoreOptions = {}): string {
  if (pool.isEmpty()) throw new NoCandidatesError();
  return rank(pool, buildFrequencyTable(pool), options)[0];
}

export const FrequencyRanker = {
  buildFrequencyTable,
  score,
  rank,
  rankWithScores,
  suggest,
} as const;
