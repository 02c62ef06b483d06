// packages/solver-core/src/words.ts
//
// Word normalisation shared by the pool, the ranker and the session.
// Words are compared case-insensitively and stored upper-case.

const LETTERS = /^[A-Z]+$/;

export function normalizeWord(raw: string): string {
  return raw.trim().toUpperCase();
}

/** True when `word` (already normalised) is exactly `length` letters A–Z. */
export function isWord(word: string, length: number): boolean {
  return word.length === length && LETTERS.test(word);
}
