// packages/anagram-core/src/errors.ts
//
// Errors raised by the letter arithmetic.

/**
 * InsufficientLettersError is thrown by subtract() when a word needs a letter
 * the pool does not have, or needs more copies of it than remain.
 */
export class InsufficientLettersError extends Error {
  readonly char: string;
  readonly word: string;

  constructor(char: string, word: string) {
    super(`Word '${word}' uses more '${char}' than available`);
    this.name = 'InsufficientLettersError';
    this.char = char;
    this.word = word;
  }
}
