// packages/protocol/src/index.ts
//
// Shared definitions for the anagram finder's inputs and outputs.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - SentenceMode: which sentence builder to run ("none", "partial", "full").
//   - RunOptions:   validated command-line options.
//   - Report:       the JSON document printed by `--json`.
//
// The CLI validates raw flag values with runOptionsSchema before touching the
// word list, and validates its own JSON output with reportSchema.

import { z } from 'zod';

/**
 * Sentence mode schema:
 *  - "none"    → only list anagrams
 *  - "partial" → greedy sentence of up to three words
 *  - "full"    → sentence that uses every remaining letter
 */
export const sentenceModeSchema = z.enum(['none', 'partial', 'full']);
export type SentenceMode = z.infer<typeof sentenceModeSchema>;

/* -------------------------------------------------------------------------- */
/*                                 Run options                                */
/* -------------------------------------------------------------------------- */

/**
 * Options for one run.
 *  - letters:   the letter pool, must not be empty (spaces alone give no matches)
 *  - wordlist:  path of a file with one word per line
 *  - minLength: shortest word to report (positive integer), defaults to 1
 *  - exclude:   words removed from the pool first, in order
 *  - sentence:  sentence mode, defaults to "none"
 *  - json:      print the machine-readable report
 */
export const runOptionsSchema = z.object({
  letters: z
    .string({ required_error: 'letters are required' })
    .min(1, 'letters are required'),
  wordlist: z
    .string({ required_error: 'a word list is required (--wordlist)' })
    .min(1, 'a word list is required (--wordlist)'),
  minLength: z.coerce
    .number({ invalid_type_error: 'minimum length must be a number' })
    .int('minimum length must be a whole number')
    .min(1, 'minimum length must be at least 1')
    .default(1),
  exclude: z.array(z.string().min(1)).default([]),
  sentence: sentenceModeSchema.default('none'),
  json: z.boolean().default(false),
});
export type RunOptions = z.infer<typeof runOptionsSchema>;

/* -------------------------------------------------------------------------- */
/*                                   Report                                   */
/* -------------------------------------------------------------------------- */

/**
 * Sentence section of the report.
 *  - mode:  "partial" or "full"
 *  - text:  the sentence, or the "not possible" text
 *  - words: the chosen words (empty when no sentence was possible)
 */
export const sentenceReportSchema = z.object({
  mode: z.enum(['partial', 'full']),
  text: z.string(),
  words: z.array(z.string()),
});

/**
 * Full report:
 *  - anagrams:      matches, longest first then alphabetical
 *  - remaining:     letter → count left after exclusions
 *  - remainingText: the same rendered as "ae(2)t", or "none"
 *  - error:         message when an excluded word could not be removed
 */
export const reportSchema = z.object({
  letters: z.string(),
  exclude: z.array(z.string()),
  minLength: z.number().int().min(1),
  anagrams: z.array(z.string()),
  remaining: z.record(z.string(), z.number().int().min(1)),
  remainingText: z.string(),
  error: z.string().optional(),
  sentence: sentenceReportSchema.optional(),
});
export type Report = z.infer<typeof reportSchema>;
