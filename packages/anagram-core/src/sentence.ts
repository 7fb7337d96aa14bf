// packages/anagram-core/src/sentence.ts
//
// Builds a short sentence out of matched words.
//
// Two strategies, chosen by the caller:
//   • partial → greedy: walk the words longest first and keep every word that
//               still fits next to the ones already taken, up to three words.
//   • full    → backtracking: find words that use up every remaining letter
//               exactly. The first solution in list order wins.
//
// When nothing works the result carries one of the sentinel texts below
// instead of a sentence.

import {
  countLetters,
  covers,
  isEmpty,
  subtract,
  wordLength,
  type LetterMultiset,
} from './multiset.js';

export type SentenceMode = 'partial' | 'full';

export const NO_SENTENCE = 'No sentence possible.';
export const NO_FULL_MATCH = 'No full-match sentence possible.';

export type SentenceResult =
  | { ok: true; words: string[]; text: string }
  | { ok: false; words: []; text: typeof NO_SENTENCE | typeof NO_FULL_MATCH };

const PARTIAL_LIMIT = 3;

/**
 * formatSentence capitalizes the first word and closes with a period.
 *
 * Example:
 *   ["silent", "tin"] → "Silent tin."
 */
export function formatSentence(words: readonly string[]): string {
  const [first = '', ...rest] = words;
  const [head = '', ...tail] = Array.from(first);
  const capitalized = head.toUpperCase() + tail.join('').toLowerCase();
  return [capitalized, ...rest].join(' ') + '.';
}

/** Stable sort by length, longest first; equal lengths keep their order. */
function byLengthDesc(words: readonly string[]): string[] {
  return [...words].sort((a, b) => wordLength(b) - wordLength(a));
}

/**
 * pickPartial greedily chooses up to three words whose combined letters fit
 * in `remaining`.
 */
export function pickPartial(
  words: readonly string[],
  remaining: LetterMultiset,
): string[] {
  const chosen: string[] = [];
  const used = new Map<string, number>();

  for (const word of byLengthDesc(words)) {
    const need = countLetters(word);
    let fits = true;
    for (const [c, n] of need) {
      if ((used.get(c) ?? 0) + n > (remaining.get(c) ?? 0)) {
        fits = false;
        break;
      }
    }
    if (!fits) continue;

    chosen.push(word);
    for (const [c, n] of need) used.set(c, (used.get(c) ?? 0) + n);
    if (chosen.length >= PARTIAL_LIMIT) break;
  }

  return chosen;
}

/**
 * pickFullMatch searches for words that consume `remaining` exactly.
 *
 * Each candidate is used at most once, and words are only taken in the order
 * they appear after sorting by length, so the search walks subsets rather
 * than permutations.
 *
 * @returns the first solution found, or null when none exists
 */
export function pickFullMatch(
  words: readonly string[],
  remaining: LetterMultiset,
): string[] | null {
  const candidates = byLengthDesc(words);
  const chosen: string[] = [];

  const search = (start: number, residual: LetterMultiset): boolean => {
    if (isEmpty(residual) && chosen.length > 0) return true;
    for (let i = start; i < candidates.length; i++) {
      const word = candidates[i];
      if (!covers(residual, word)) continue;
      chosen.push(word);
      if (search(i + 1, subtract(residual, word))) return true;
      chosen.pop();
    }
    return false;
  };

  return search(0, remaining) ? chosen : null;
}

/**
 * composeSentence turns matched words into a sentence using the letters
 * left in the pool.
 *
 * Example:
 *   composeSentence(["ox"], fromText("ox"), "full") → { ok: true, words: ["ox"], text: "Ox." }
 */
export function composeSentence(
  words: readonly string[],
  remaining: LetterMultiset,
  mode: SentenceMode,
): SentenceResult {
  if (words.length === 0) return { ok: false, words: [], text: NO_SENTENCE };

  if (mode === 'full') {
    const solution = pickFullMatch(words, remaining);
    if (!solution) return { ok: false, words: [], text: NO_FULL_MATCH };
    return { ok: true, words: solution, text: formatSentence(solution) };
  }

  const picked = pickPartial(words, remaining);
  if (picked.length === 0) return { ok: false, words: [], text: NO_SENTENCE };
  return { ok: true, words: picked, text: formatSentence(picked) };
}
