// apps/cli/src/__tests__/args.test.ts
//
// Unit tests for parseCommand(): flag handling, environment defaults and the
// precedence between the two sentence flags.

import { parseCommand, resolveSentenceMode, splitExclusions } from '../args.js';
import type { Config } from '../config.js';
import { InvalidArgumentsError } from '../errors.js';

const config: Config = { logLevel: 'silent' };

function runOptions(argv: string[], cfg: Config = config) {
  const command = parseCommand(argv, cfg);
  if (command.kind !== 'run') {
    throw new Error(`expected run, got ${command.kind}`);
  }
  return command.options;
}

describe('parseCommand', () => {
  it('reads letters and the word list', () => {
    expect(runOptions(['listen', '-w', 'words.txt'])).toEqual({
      letters: 'listen',
      wordlist: 'words.txt',
      minLength: 1,
      exclude: [],
      sentence: 'none',
      json: false,
    });
  });

  it('joins several positionals into one letter string', () => {
    expect(runOptions(['eat', 'tea', '--wordlist', 'w.txt']).letters).toBe(
      'eat tea',
    );
  });

  it('parses the minimum length', () => {
    expect(runOptions(['eat', '-w', 'w.txt', '-m', '4']).minLength).toBe(4);
  });

  it('collects repeated and comma separated exclusions in order', () => {
    const argv = ['cat', '-w', 'w.txt', '-e', 'at,c', '--exclude', 'x'];
    expect(runOptions(argv).exclude).toEqual(['at', 'c', 'x']);
  });

  it('selects partial mode for --sentence', () => {
    expect(runOptions(['ox', '-w', 'w.txt', '-s']).sentence).toBe('partial');
  });

  it('prefers full-match when both sentence flags are set', () => {
    expect(runOptions(['ox', '-w', 'w.txt', '-s', '-f']).sentence).toBe('full');
    expect(runOptions(['ox', '-w', 'w.txt', '-f', '-s']).sentence).toBe('full');
  });

  it('falls back to environment defaults', () => {
    const opts = runOptions(['ox'], {
      logLevel: 'silent',
      wordlist: 'env.txt',
      minLength: '2',
    });
    expect(opts.wordlist).toBe('env.txt');
    expect(opts.minLength).toBe(2);
  });

  it('lets flags override environment defaults', () => {
    const opts = runOptions(['ox', '-w', 'flag.txt', '-m', '1'], {
      logLevel: 'silent',
      wordlist: 'env.txt',
      minLength: '2',
    });
    expect(opts.wordlist).toBe('flag.txt');
    expect(opts.minLength).toBe(1);
  });

  it('returns about and help without requiring letters', () => {
    expect(parseCommand(['--about'], config)).toEqual({ kind: 'about' });
    expect(parseCommand(['-h'], config)).toEqual({ kind: 'help' });
  });

  it('rejects missing letters', () => {
    expect(() => parseCommand(['-w', 'w.txt'], config)).toThrow(
      new InvalidArgumentsError('letters are required'),
    );
  });

  it('rejects a missing word list', () => {
    expect(() => parseCommand(['cat'], config)).toThrow(
      'a word list is required (--wordlist)',
    );
  });

  it('rejects a minimum length below one', () => {
    const argv = ['cat', '-w', 'w.txt', '-m', '0'];
    expect(() => parseCommand(argv, config)).toThrow(
      'minimum length must be at least 1',
    );
  });

  it('rejects unknown flags', () => {
    expect(() => parseCommand(['cat', '--bogus'], config)).toThrow(
      InvalidArgumentsError,
    );
  });
});

describe('resolveSentenceMode', () => {
  it('maps flags to a mode', () => {
    expect(resolveSentenceMode({})).toBe('none');
    expect(resolveSentenceMode({ sentence: true })).toBe('partial');
    expect(resolveSentenceMode({ fullSentence: true })).toBe('full');
    expect(
      resolveSentenceMode({ sentence: true, fullSentence: true }),
    ).toBe('full');
  });
});

describe('splitExclusions', () => {
  it('drops empty pieces', () => {
    expect(splitExclusions(['at, dog', ',', ' cow '])).toEqual([
      'at',
      'dog',
      'cow',
    ]);
    expect(splitExclusions()).toEqual([]);
  });
});
