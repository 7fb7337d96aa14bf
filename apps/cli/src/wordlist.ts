// apps/cli/src/wordlist.ts
//
// Word list loading. The file holds one word per line; words are trimmed and
// lowercased, blank lines are skipped and repeats collapse into one entry.
// A file that cannot be read comes back as a failed result, never a throw.

import fs from 'node:fs';
import { WordListUnavailableError } from './errors.js';

export type WordListResult =
  | { ok: true; words: ReadonlySet<string> }
  | { ok: false; error: WordListUnavailableError };

export function parseWordList(text: string): Set<string> {
  const words = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (word) words.add(word);
  }
  return words;
}

export async function loadWordList(path: string): Promise<WordListResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(path, 'utf8');
  } catch (err) {
    return { ok: false, error: new WordListUnavailableError(path, err) };
  }
  return { ok: true, words: parseWordList(raw) };
}
