// apps/cli/src/dictionary.ts
//
// Word lists can come from two sources:
//   1. A JSON file named by --words or WORDS_FILE
//   2. The bundled fallback list in apps/cli/data/words.json
//
// Either way the file is a JSON array of strings. Entries of other lengths
// are dropped, so one file can serve several word lengths.

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Logger } from 'pino';

import { CandidatePool, InvalidDictionaryError } from '@freqsolve/solver-core';
import { wordListSchema } from '@freqsolve/protocol';

export const BUNDLED_WORDS_FILE = fileURLToPath(
  new URL('../data/words.json', import.meta.url),
);

export function loadWordList(path: string): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidDictionaryError(`Could not read word list ${path}: ${reason}`);
  }

  const parsed = wordListSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid format';
    throw new InvalidDictionaryError(`Word list ${path} is invalid: ${reason}`);
  }
  return parsed.data;
}

export interface DictionarySource {
  wordsFile?: string;
  wordLength: number;
}

export function loadDictionary(source: DictionarySource, log: Logger): CandidatePool {
  const path = source.wordsFile ?? BUNDLED_WORDS_FILE;
  const words = loadWordList(path);
  const pool = CandidatePool.fromCorpus(words, source.wordLength);
  log.info(
    {
      path,
      bundled: source.wordsFile === undefined,
      entries: words.length,
      words: pool.size(),
      wordLength: pool.wordLength,
    },
    'dictionary loaded',
  );
  return pool;
}
