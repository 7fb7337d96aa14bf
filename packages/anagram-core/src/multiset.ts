// packages/anagram-core/src/multiset.ts
//
// Letter multiset: a map from character to a positive occurrence count.
// Every operation returns a fresh map; a count that reaches zero is removed,
// and no count is ever allowed to go negative.
//
// Exports:
//   • fromText       → build a pool from raw user text
//   • countLetters   → per-character counts of a single word
//   • subtract       → remove a word's letters (throws on shortage)
//   • covers         → can the word be spelled from the pool?
//   • totalCount     → number of letters in the pool
//   • letterEntries  → sorted { letter, count } entries for display
//   • formatRemaining→ "a(2)bc" style rendering, "none" when empty

import { InsufficientLettersError } from './errors.js';

export type LetterMultiset = ReadonlyMap<string, number>;

export type LetterEntry = { letter: string; count: number };

/** Characters of a string by code point, so surrogate pairs count once. */
export function chars(text: string): string[] {
  return Array.from(text);
}

/**
 * Orders strings by code point, so characters outside the BMP sort after
 * U+FFFF rather than among the surrogates.
 */
export function compareCodePoints(a: string, b: string): number {
  const x = chars(a);
  const y = chars(b);
  for (let i = 0; i < Math.min(x.length, y.length); i++) {
    const d = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
    if (d !== 0) return d;
  }
  return x.length - y.length;
}

/** Length of a word in characters (code points). */
export function wordLength(word: string): number {
  return chars(word).length;
}

/**
 * countLetters tallies each character of `word` after lowercasing it.
 * No characters are skipped.
 */
export function countLetters(word: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const c of chars(word.toLowerCase())) {
    counts.set(c, (counts.get(c) ?? 0) + 1);
  }
  return counts;
}

/**
 * fromText builds the letter pool from raw input: whitespace is dropped,
 * everything else is lowercased and counted (punctuation and digits included).
 *
 * Example:
 *   fromText("Eat tea") → { e:2, a:2, t:2 }
 */
export function fromText(text: string): LetterMultiset {
  return countLetters(text.replace(/\s+/g, ''));
}

/**
 * subtract removes the letters of `word` from `base`.
 *
 * The work happens on a copy, so `base` is untouched whether or not the
 * subtraction succeeds.
 *
 * @throws InsufficientLettersError when a letter is missing or short
 */
export function subtract(base: LetterMultiset, word: string): LetterMultiset {
  const remaining = new Map(base);
  for (const [c, needed] of countLetters(word)) {
    const have = remaining.get(c) ?? 0;
    if (have < needed) throw new InsufficientLettersError(c, word);
    if (have === needed) remaining.delete(c);
    else remaining.set(c, have - needed);
  }
  return remaining;
}

/** covers reports whether every letter of `word` is available in `base`. */
export function covers(base: LetterMultiset, word: string): boolean {
  for (const [c, needed] of countLetters(word)) {
    if ((base.get(c) ?? 0) < needed) return false;
  }
  return true;
}

export function totalCount(m: LetterMultiset): number {
  let n = 0;
  for (const count of m.values()) n += count;
  return n;
}

export function isEmpty(m: LetterMultiset): boolean {
  return totalCount(m) === 0;
}

export function letterEntries(m: LetterMultiset): LetterEntry[] {
  return [...m.entries()]
    .filter(([, count]) => count > 0)
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([letter, count]) => ({ letter, count }));
}

/**
 * formatRemaining renders the pool the way the report prints it:
 * a letter alone when it appears once, `letter(count)` otherwise.
 *
 * Example:
 *   { t:1, e:2, a:1 } → "ae(2)t"
 */
export function formatRemaining(m: LetterMultiset): string {
  const text = letterEntries(m)
    .map(({ letter, count }) => (count > 1 ? `${letter}(${count})` : letter))
    .join('');
  return text || 'none';
}

export function toRecord(m: LetterMultiset): Record<string, number> {
  const out: Record<string, number> = {};
  for (const { letter, count } of letterEntries(m)) out[letter] = count;
  return out;
}
