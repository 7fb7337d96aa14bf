// packages/anagram-core/src/index.ts
//
// Entry point for the anagram-core package.
// Re-exports the letter arithmetic, the search and the sentence builder.
//
// Includes:
//   • multiset.ts  → letter pool type and arithmetic (fromText, subtract, covers…)
//   • exclusion.ts → removing excluded words from the pool (applyExclusions)
//   • matcher.ts   → anagram search and ordering (findAnagrams, matchWords)
//   • sentence.ts  → partial / full-match sentence building (composeSentence)
//   • errors.ts    → InsufficientLettersError
//
// Example usage:
//   import { findAnagrams, composeSentence } from '@anagram/core';

export * from './errors.js';
export * from './multiset.js';
export * from './exclusion.js';
export * from './matcher.js';
export * from './sentence.js';
