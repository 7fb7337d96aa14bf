// apps/cli/src/args.ts
//
// Turns argv into a command. Flag syntax is handled by node:util parseArgs;
// the values are then checked with the shared runOptionsSchema so that a bad
// minimum length or a missing word list is reported before any file is read.

import { parseArgs } from 'node:util';
import {
  runOptionsSchema,
  type RunOptions,
  type SentenceMode,
} from '@anagram/protocol';
import type { Config } from './config.js';
import { InvalidArgumentsError } from './errors.js';

export type Command =
  | { kind: 'about' }
  | { kind: 'help' }
  | { kind: 'run'; options: RunOptions };

/**
 * Full-match wins when both sentence flags are given.
 */
export function resolveSentenceMode(flags: {
  sentence?: boolean;
  fullSentence?: boolean;
}): SentenceMode {
  if (flags.fullSentence) return 'full';
  if (flags.sentence) return 'partial';
  return 'none';
}

/** "-e at,dog -e cow" → ["at", "dog", "cow"] */
export function splitExclusions(values: readonly string[] = []): string[] {
  return values.flatMap((v) => v.split(/[\s,]+/)).filter(Boolean);
}

function isParseArgsError(err: unknown): err is Error {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS')
  );
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        wordlist: { type: 'string', short: 'w' },
        'min-length': { type: 'string', short: 'm' },
        exclude: { type: 'string', short: 'e', multiple: true },
        sentence: { type: 'boolean', short: 's' },
        'full-sentence': { type: 'boolean', short: 'f' },
        json: { type: 'boolean' },
        about: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    if (isParseArgsError(err)) throw new InvalidArgumentsError(err.message);
    throw err;
  }
}

export function parseCommand(argv: readonly string[], config: Config): Command {
  const { values, positionals } = readFlags(argv);

  if (values.help) return { kind: 'help' };
  if (values.about) return { kind: 'about' };

  const parsed = runOptionsSchema.safeParse({
    letters: positionals.length > 0 ? positionals.join(' ') : undefined,
    wordlist: values.wordlist ?? config.wordlist,
    minLength: values['min-length'] ?? config.minLength,
    exclude: splitExclusions(values.exclude),
    sentence: resolveSentenceMode({
      sentence: values.sentence,
      fullSentence: values['full-sentence'],
    }),
    json: values.json ?? false,
  });
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'invalid arguments';
    throw new InvalidArgumentsError(message);
  }

  return { kind: 'run', options: parsed.data };
}
