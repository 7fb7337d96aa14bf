// apps/cli/src/logger.ts
//
// Diagnostics go to stderr so stdout only ever carries the report.

import { pino, destination, type Logger } from 'pino';
import type { Config } from './config.js';

export function createLogger(level: Config['logLevel']): Logger {
  return pino({ name: 'anagram', level }, destination(2));
}
