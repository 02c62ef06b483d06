// apps/cli/src/config.ts
//
// Environment-driven settings. `dotenv/config` (imported by the entry point)
// fills process.env from .env first; command-line flags override these.

import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  WORDS_FILE: z.string().min(1).optional(),
  WORD_LENGTH: z.coerce.number().int().min(1).max(32).default(5),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(6),
  HURDLE_PUZZLES: z.coerce.number().int().min(1).max(20).default(4),
});

export type Config = z.infer<typeof envSchema>;

/** Throws a ZodError naming every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return envSchema.parse(env);
}
