// packages/anagram-core/src/exclusion.ts
//
// Removes the letters of excluded words from the pool before searching.
//
// Words are subtracted in the order given. The first one that cannot be
// taken out stops the run: the pool is returned as it stood before that word,
// together with the error, and the caller reports no anagrams.

import { InsufficientLettersError } from './errors.js';
import { subtract, type LetterMultiset } from './multiset.js';

export type ExclusionResult =
  | { ok: true; remaining: LetterMultiset }
  | { ok: false; remaining: LetterMultiset; error: InsufficientLettersError };

/**
 * applyExclusions subtracts each excluded word from `pool` in turn.
 *
 * Example:
 *   applyExclusions(fromText("cat"), ["at"])  → { ok: true, remaining: { c:1 } }
 *   applyExclusions(fromText("cat"), ["dog"]) → { ok: false, remaining: { c:1, a:1, t:1 }, error }
 */
export function applyExclusions(
  pool: LetterMultiset,
  exclusions: readonly string[] = [],
): ExclusionResult {
  let remaining = pool;
  for (const word of exclusions) {
    try {
      remaining = subtract(remaining, word);
    } catch (err) {
      if (err instanceof InsufficientLettersError) {
        return { ok: false, remaining, error: err };
      }
      throw err;
    }
  }
  return { ok: true, remaining };
}
