// apps/cli/src/__tests__/run.test.ts
//
// End-to-end runs against a temporary word list, with output captured
// through the injected writer.

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { ABOUT_TEXT, USAGE } from '../about.js';
import type { Config } from '../config.js';
import { run, type Output } from '../run.js';

const config: Config = { logLevel: 'silent' };
const log = pino({ level: 'silent' });

let dir: string;
let wordsFile: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'anagram-run-'));
  wordsFile = path.join(dir, 'words.txt');
  fs.writeFileSync(
    wordsFile,
    ['silent', 'Enlist', 'tin', 'lens', 'tin', 'ox'].join('\n'),
  );
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const io: Output = { out: (l) => out.push(l), err: (l) => err.push(l) };
  return { io, out, err };
}

describe('run', () => {
  it('prints matches and a sentence', async () => {
    const { io, out, err } = capture();
    const code = await run(['listen', '-w', wordsFile, '-s'], {
      io,
      log,
      config,
    });
    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      '',
      'Found 4 anagrams:',
      'enlist',
      'silent',
      'lens',
      'tin',
      '',
      'Partial sentence: Enlist.',
    ]);
  });

  it('prints a JSON report', async () => {
    const { io, out } = capture();
    const code = await run(['ox', '-w', wordsFile, '-f', '--json'], {
      io,
      log,
      config,
    });
    expect(code).toBe(0);
    expect(JSON.parse(out.join('\n'))).toEqual({
      letters: 'ox',
      exclude: [],
      minLength: 1,
      anagrams: ['ox'],
      remaining: { o: 1, x: 1 },
      remainingText: 'ox',
      sentence: { mode: 'full', text: 'Ox.', words: ['ox'] },
    });
  });

  it('exits with 1 when the word list is missing', async () => {
    const { io, out, err } = capture();
    const missing = path.join(dir, 'nope.txt');
    const code = await run(['ox', '-w', missing], { io, log, config });
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([`Error: Word list file '${missing}' not found.`]);
  });

  it('exits with 2 and prints usage on bad arguments', async () => {
    const { io, err } = capture();
    const code = await run(['-w', wordsFile], { io, log, config });
    expect(code).toBe(2);
    expect(err).toEqual(['Error: letters are required', USAGE]);
  });

  it('treats letters made only of spaces as an empty pool', async () => {
    const { io, out, err } = capture();
    const code = await run(['  ', '-w', wordsFile], { io, log, config });
    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual(['No anagrams found.']);
  });

  it('prints the about text', async () => {
    const { io, out } = capture();
    expect(await run(['--about'], { io, log, config })).toBe(0);
    expect(out).toEqual([ABOUT_TEXT]);
  });

  it('uses the word list from the environment', async () => {
    const { io, out } = capture();
    const code = await run(['ox'], {
      io,
      log,
      config: { ...config, wordlist: wordsFile },
    });
    expect(code).toBe(0);
    expect(out).toEqual(['', 'Found 1 anagrams:', 'ox']);
  });
});
