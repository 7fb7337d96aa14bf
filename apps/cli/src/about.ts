// apps/cli/src/about.ts

export const ABOUT_TEXT = `
Anagram Finder
Version: 1.0.0
Description: A command-line tool to find anagrams from given letters, with
options to exclude words, set a minimum word length, and build sentences
(partial or full-match).
License: MIT
`;

export const USAGE = `Usage:
  anagram <letters> --wordlist <file> [options]
  anagram --about

Options:
  -w, --wordlist <file>    Word list, one word per line (env: ANAGRAM_WORDLIST)
  -m, --min-length <n>     Minimum word length (default: 1,
                           env: ANAGRAM_MIN_LENGTH)
  -e, --exclude <words>    Words removed from the letters first; repeat the flag
                           or separate words with commas
  -s, --sentence           Build a sentence from up to three anagrams
  -f, --full-sentence      Build a sentence using every remaining letter
                           (takes precedence over --sentence)
      --json               Print the result as JSON
      --about              Show information about this tool
  -h, --help               Show this help`;
