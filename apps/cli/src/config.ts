// apps/cli/src/config.ts
//
// Environment-driven defaults. The entry point loads `.env` through
// dotenv/config before this runs, so values there count as well.
//
//   ANAGRAM_WORDLIST   → default for --wordlist
//   ANAGRAM_MIN_LENGTH → default for --min-length (validated with the flags)
//   LOG_LEVEL          → pino level, "warn" unless set

import { z } from 'zod';

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  ANAGRAM_WORDLIST: optionalText,
  ANAGRAM_MIN_LENGTH: optionalText,
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .catch('warn'),
});

export type Config = {
  wordlist?: string;
  minLength?: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  return {
    wordlist: parsed.ANAGRAM_WORDLIST,
    minLength: parsed.ANAGRAM_MIN_LENGTH,
    logLevel: parsed.LOG_LEVEL,
  };
}
