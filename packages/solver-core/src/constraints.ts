// packages/solver-core/src/constraints.ts
//
// Turns one feedback record into the constraints a candidate must satisfy.
//
// Per letter of the guess we tally how many positions were marked
// green/yellow ("known" copies) and whether any position was black:
//   • green at i            → candidate[i] must equal the letter
//   • yellow/black at i     → candidate[i] must not equal the letter
//   • known copies k        → candidate holds at least k of the letter
//   • any black on a letter → candidate holds exactly k (0 if none known)
//
// The last rule is what makes double letters work: guessing "SPEED" with one
// E black and one E yellow means "exactly one E, not at either position",
// rather than "no E at all".

import type { Mark } from './scoring.js';

export interface FeedbackConstraints {
  /** position → required letter */
  fixed: ReadonlyMap<number, string>;
  /** position → letters that may not appear there */
  forbidden: ReadonlyMap<number, ReadonlySet<string>>;
  minCount: ReadonlyMap<string, number>;
  /** Only present for letters that received a black mark. */
  maxCount: ReadonlyMap<string, number>;
}

export function deriveConstraints(
  guess: string,
  marks: readonly Mark[],
): FeedbackConstraints {
  const fixed = new Map<number, string>();
  const forbidden = new Map<number, Set<string>>();
  const tally = new Map<string, { known: number; black: boolean }>();

  const forbid = (pos: number, ch: string) => {
    let s = forbidden.get(pos);
    if (!s) {
      s = new Set<string>();
      forbidden.set(pos, s);
    }
    s.add(ch);
  };

  for (let i = 0; i < guess.length; i++) {
    const ch = guess[i];
    const t = tally.get(ch) ?? { known: 0, black: false };
    switch (marks[i]) {
      case 'green':
        fixed.set(i, ch);
        t.known++;
        break;
      case 'yellow':
        forbid(i, ch);
        t.known++;
        break;
      case 'black':
        forbid(i, ch);
        t.black = true;
        break;
    }
    tally.set(ch, t);
  }

  const minCount = new Map<string, number>();
  const maxCount = new Map<string, number>();
  for (const [ch, t] of tally) {
    if (t.known > 0) minCount.set(ch, t.known);
    if (t.black) maxCount.set(ch, t.known);
  }

  return { fixed, forbidden, minCount, maxCount };
}

export function satisfies(word: string, c: FeedbackConstraints): boolean {
  for (const [pos, ch] of c.fixed) {
    if (word[pos] !== ch) return false;
  }
  for (const [pos, letters] of c.forbidden) {
    if (letters.has(word[pos])) return false;
  }

  const counts = new Map<string, number>();
  for (const ch of word) counts.set(ch, (counts.get(ch) ?? 0) + 1);

  for (const [ch, min] of c.minCount) {
    if ((counts.get(ch) ?? 0) < min) return false;
  }
  for (const [ch, max] of c.maxCount) {
    if ((counts.get(ch) ?? 0) > max) return false;
  }
  return true;
}
