// packages/anagram-core/src/matcher.ts
//
// Anagram search over a word list.
//
// A word matches when it fits in the pool (length and letter counts) and is
// at least `minLength` characters long. Matches are ordered longest first,
// then alphabetically, independent of the word list's iteration order.

import { applyExclusions } from './exclusion.js';
import type { InsufficientLettersError } from './errors.js';
import {
  compareCodePoints,
  covers,
  fromText,
  totalCount,
  wordLength,
  type LetterMultiset,
} from './multiset.js';

export type MatchOptions = {
  /** Shortest word to report (default 1). */
  minLength?: number;
  /** Words whose letters are taken out of the pool first, in order. */
  exclude?: readonly string[];
};

export type AnagramResult = {
  words: string[];
  remaining: LetterMultiset;
  /** Set when an excluded word could not be subtracted. */
  error?: InsufficientLettersError;
};

/** Longest first; equal lengths by code point. */
export function compareMatches(a: string, b: string): number {
  return wordLength(b) - wordLength(a) || compareCodePoints(a, b);
}

/**
 * matchWords filters `words` against an already-built pool.
 *
 * @returns matching words, sorted with compareMatches
 */
export function matchWords(
  pool: LetterMultiset,
  words: Iterable<string>,
  minLength = 1,
): string[] {
  const available = totalCount(pool);
  const seen = new Set<string>();
  for (const word of words) {
    const len = wordLength(word);
    if (len <= available && len >= minLength && covers(pool, word)) {
      seen.add(word);
    }
  }
  return [...seen].sort(compareMatches);
}

/**
 * findAnagrams runs the whole search for a raw letter string.
 *
 * Example:
 *   findAnagrams("listen", ["silent", "enlist", "tin", "lens"])
 *   → { words: ["enlist", "silent", "lens", "tin"], remaining: { l:1, i:1, s:1, t:1, e:1, n:1 } }
 */
export function findAnagrams(
  letters: string,
  words: Iterable<string>,
  options: MatchOptions = {},
): AnagramResult {
  const { minLength = 1, exclude = [] } = options;
  const excluded = applyExclusions(fromText(letters), exclude);
  if (!excluded.ok) {
    return { words: [], remaining: excluded.remaining, error: excluded.error };
  }
  return {
    words: matchWords(excluded.remaining, words, minLength),
    remaining: excluded.remaining,
  };
}
