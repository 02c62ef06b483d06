// apps/cli/src/__tests__/config.test.ts

import { ZodError } from 'zod';

import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: 'info',
      WORD_LENGTH: 5,
      MAX_ATTEMPTS: 6,
      HURDLE_PUZZLES: 4,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      WORDS_FILE: '/data/words.json',
      WORD_LENGTH: '6',
      MAX_ATTEMPTS: '8',
    });
    expect(config.LOG_LEVEL).toBe('debug');
    expect(config.WORDS_FILE).toBe('/data/words.json');
    expect(config.WORD_LENGTH).toBe(6);
    expect(config.MAX_ATTEMPTS).toBe(8);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ WORD_LENGTH: 'five' })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});
