// packages/protocol/src/index.ts
//
// Input schemas shared by solver front ends.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Mark:     per-letter feedback ("green", "yellow", "black").
//   - Mode:     game mode ("wordle", "hurdle").
//   - feedbackInput: raw "GYB" strings typed by a player → Mark[].
//   - wordListSchema: shape of a dictionary file on disk.

import { z } from 'zod';

/**
 * Mark schema:
 *  - "green"  → correct letter, correct position
 *  - "yellow" → correct letter, wrong position
 *  - "black"  → no further occurrence of the letter
 */
export const markSchema = z.enum(['green', 'yellow', 'black']);
export type Mark = z.infer<typeof markSchema>;

/**
 * Mode schema:
 *  - "wordle" → a single puzzle
 *  - "hurdle" → chained puzzles, each answer opens the next one
 */
export const modeSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['wordle', 'hurdle']));
export type Mode = z.infer<typeof modeSchema>;

/* -------------------------------------------------------------------------- */
/*                              Feedback strings                              */
/* -------------------------------------------------------------------------- */

export const feedbackCodeSchema = z.enum(['G', 'Y', 'B'], {
  errorMap: () => ({ message: 'Use only G, Y or B for each position' }),
});
export type FeedbackCode = z.infer<typeof feedbackCodeSchema>;

const MARK_BY_CODE = { G: 'green', Y: 'yellow', B: 'black' } as const satisfies Record<
  FeedbackCode,
  Mark
>;

const CODE_BY_MARK = { green: 'G', yellow: 'Y', black: 'B' } as const satisfies Record<
  Mark,
  FeedbackCode
>;

/**
 * Feedback typed by a player, one character per position:
 *  - exactly `length` characters after trimming
 *  - case-insensitive G / Y / B
 *
 * Example:
 *   feedbackInput(5).parse(' bygbb ')
 *   → ["black", "yellow", "green", "black", "black"]
 */
export const feedbackInput = (length: number) =>
  z
    .string()
    .trim()
    .toUpperCase()
    .length(length, { message: `Result must be ${length} characters` })
    .transform((raw) => raw.split(''))
    .pipe(z.array(feedbackCodeSchema.transform((code) => MARK_BY_CODE[code])));

export function formatFeedback(marks: readonly Mark[]): string {
  return marks.map((m) => CODE_BY_MARK[m]).join('');
}

/* -------------------------------------------------------------------------- */
/*                                 Word lists                                 */
/* -------------------------------------------------------------------------- */

/** A dictionary file: a non-empty JSON array of strings. */
export const wordListSchema = z
  .array(z.string())
  .min(1, { message: 'Word list is empty' });
export type WordList = z.infer<typeof wordListSchema>;
