// apps/cli/src/report.ts
//
// Runs the search for a set of options and renders the outcome, either as the
// line-oriented text report or as the JSON document described by reportSchema.

import {
  composeSentence,
  findAnagrams,
  formatRemaining,
  toRecord,
} from '@anagram/core';
import { reportSchema, type Report, type RunOptions } from '@anagram/protocol';
import type { Logger } from 'pino';

/**
 * solve runs exclusions, the anagram search and, when asked, the sentence
 * builder, and collects everything into a Report.
 */
export function solve(
  options: RunOptions,
  words: Iterable<string>,
  log: Logger,
): Report {
  const { letters, exclude, minLength, sentence } = options;
  const result = findAnagrams(letters, words, { minLength, exclude });

  const report: Report = {
    letters,
    exclude,
    minLength,
    anagrams: result.words,
    remaining: toRecord(result.remaining),
    remainingText: formatRemaining(result.remaining),
  };

  if (result.error) {
    log.warn(
      { word: result.error.word, char: result.error.char },
      'exclusion failed',
    );
    report.error = result.error.message;
  }
  log.debug({ matches: result.words.length }, 'anagram search done');

  if (sentence !== 'none') {
    const built = composeSentence(result.words, result.remaining, sentence);
    report.sentence = { mode: sentence, text: built.text, words: built.words };
  }

  return reportSchema.parse(report);
}

/**
 * renderText lays the report out line by line.
 *
 * Example (letters "cat", --exclude at):
 *   Remaining letters: c
 *   Found 1 anagrams:
 *   (After excluding: at)
 *   c
 */
export function renderText(report: Report): string[] {
  const lines: string[] = [];
  const excluded = report.exclude.join(' ');

  if (report.error) lines.push(`Error: ${report.error}`);

  if (report.exclude.length > 0) {
    lines.push('', `After excluding: ${excluded}`);
    lines.push(`Remaining letters: ${report.remainingText}`);
  }

  if (report.anagrams.length > 0) {
    lines.push('', `Found ${report.anagrams.length} anagrams:`);
    if (report.exclude.length > 0) lines.push(`(After excluding: ${excluded})`);
    lines.push(...report.anagrams);
  } else {
    lines.push('No anagrams found.');
  }

  if (report.sentence) {
    const label = report.sentence.mode === 'full' ? 'Full-match' : 'Partial';
    lines.push('', `${label} sentence: ${report.sentence.text}`);
  }

  return lines;
}

export function renderJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}
