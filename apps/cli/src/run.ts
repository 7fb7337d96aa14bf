// apps/cli/src/run.ts
//
// One invocation of the tool, from argv to exit code. Output goes through the
// injected writer and diagnostics through the injected logger, so the whole
// flow can be driven from tests. Setting the process exit status is left to
// the caller.

import type { Logger } from 'pino';
import { ABOUT_TEXT, USAGE } from './about.js';
import { parseCommand, type Command } from './args.js';
import type { Config } from './config.js';
import { InvalidArgumentsError } from './errors.js';
import { renderJson, renderText, solve } from './report.js';
import { loadWordList } from './wordlist.js';

export type Output = {
  out(line: string): void;
  err(line: string): void;
};

export type RunDeps = {
  io: Output;
  log: Logger;
  config: Config;
};

export const EXIT_OK = 0;
export const EXIT_WORDLIST = 1;
export const EXIT_USAGE = 2;

export async function run(
  argv: readonly string[],
  deps: RunDeps,
): Promise<number> {
  const { io, log, config } = deps;

  let command: Command;
  try {
    command = parseCommand(argv, config);
  } catch (err) {
    if (!(err instanceof InvalidArgumentsError)) throw err;
    log.debug({ argv }, err.message);
    io.err(`Error: ${err.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }
  if (command.kind === 'about') {
    io.out(ABOUT_TEXT);
    return EXIT_OK;
  }

  const { options } = command;
  const loaded = await loadWordList(options.wordlist);
  if (!loaded.ok) {
    log.error(
      { path: loaded.error.path, err: loaded.error.cause },
      'word list unavailable',
    );
    io.err(`Error: ${loaded.error.message}`);
    return EXIT_WORDLIST;
  }
  log.debug(
    { path: options.wordlist, size: loaded.words.size },
    'word list loaded',
  );

  const report = solve(options, loaded.words, log);
  if (options.json) {
    io.out(renderJson(report));
  } else {
    for (const line of renderText(report)) io.out(line);
  }
  return EXIT_OK;
}
