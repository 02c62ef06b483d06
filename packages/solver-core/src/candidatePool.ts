// packages/solver-core/src/candidatePool.ts
//
// CandidatePool: the words that may still be the answer.
//
// A pool is immutable: `filter` returns a new pool and leaves both the
// receiver and the source dictionary untouched. Word order is always the
// original dictionary order, which the ranker relies on to break ties.

import { deriveConstraints, satisfies } from './constraints.js';
import { InvalidDictionaryError, InvalidFeedbackError } from './errors.js';
import { isMark, type Mark } from './scoring.js';
import { isWord, normalizeWord } from './words.js';

export interface PoolOptions {
  /** Session word length. Defaults to the length of the first word. */
  wordLength?: number;
}

export class CandidatePool implements Iterable<string> {
  private readonly members: ReadonlySet<string>;

  private constructor(
    private readonly words: readonly string[],
    readonly wordLength: number,
  ) {
    this.members = new Set(words);
  }

  /**
   * Builds a pool from a dictionary. Every entry must be a word of the
   * session length; duplicates keep their first position.
   *
   * @throws InvalidDictionaryError on an empty list, a bad `wordLength`,
   *         or any entry that is not `wordLength` letters A–Z.
   */
  static initialize(
    dictionary: readonly string[],
    options: PoolOptions = {},
  ): CandidatePool {
    if (dictionary.length === 0) {
      throw new InvalidDictionaryError('Dictionary is empty');
    }
    const normalized = dictionary.map(normalizeWord);
    const wordLength = options.wordLength ?? normalized[0].length;
    if (!Number.isInteger(wordLength) || wordLength < 1) {
      throw new InvalidDictionaryError(
        `Word length must be a positive integer, got ${wordLength}`,
      );
    }

    normalized.forEach((word, i) => {
      if (!isWord(word, wordLength)) {
        throw new InvalidDictionaryError(
          `Entry ${i} ("${dictionary[i]}") is not a ${wordLength}-letter word`,
        );
      }
    });

    return new CandidatePool(dedupe(normalized), wordLength);
  }

  /**
   * Builds a pool from a mixed corpus, keeping only the entries that are
   * `wordLength` letters long. Used when a word file serves several games.
   */
  static fromCorpus(corpus: readonly string[], wordLength: number): CandidatePool {
    const words = corpus
      .map(normalizeWord)
      .filter((w) => isWord(w, wordLength));
    if (words.length === 0) {
      throw new InvalidDictionaryError(`Corpus has no ${wordLength}-letter words`);
    }
    return new CandidatePool(dedupe(words), wordLength);
  }

  /**
   * Keeps the words consistent with one feedback record.
   *
   * @throws InvalidFeedbackError when the guess or the marks don't fit the
   *         session length, or a mark is unknown. The pool is not changed.
   */
  filter(guess: string, feedback: readonly Mark[]): CandidatePool {
    const g = normalizeWord(guess);
    if (!isWord(g, this.wordLength)) {
      throw new InvalidFeedbackError(
        `Guess "${guess}" is not a ${this.wordLength}-letter word`,
      );
    }
    if (feedback.length !== this.wordLength) {
      throw new InvalidFeedbackError(
        `Expected ${this.wordLength} marks, got ${feedback.length}`,
      );
    }
    const bad = feedback.findIndex((m) => !isMark(m));
    if (bad !== -1) {
      throw new InvalidFeedbackError(
        `Unknown mark "${String(feedback[bad])}" at position ${bad}`,
      );
    }

    const constraints = deriveConstraints(g, feedback);
    return new CandidatePool(
      this.words.filter((w) => satisfies(w, constraints)),
      this.wordLength,
    );
  }

  isEmpty(): boolean {
    return this.words.length === 0;
  }

  size(): number {
    return this.words.length;
  }

  has(word: string): boolean {
    return this.members.has(normalizeWord(word));
  }

  toArray(): string[] {
    return [...this.words];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.words[Symbol.iterator]();
  }
}

function dedupe(words: readonly string[]): string[] {
  return [...new Set(words)];
}
