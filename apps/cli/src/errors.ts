// apps/cli/src/errors.ts
//
// Failures of the command-line layer. Both end the run; the entry point maps
// them to exit codes (InvalidArgumentsError → 2, WordListUnavailableError → 1).

export class InvalidArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}

export class WordListUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const missing =
      cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
    super(
      missing
        ? `Word list file '${path}' not found.`
        : `Word list file '${path}' could not be read.`,
      { cause },
    );
    this.name = 'WordListUnavailableError';
    this.path = path;
  }
}
