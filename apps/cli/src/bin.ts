#!/usr/bin/env node
// apps/cli/src/bin.ts
//
// Process entry point: loads .env, wires console output and the pino logger
// into run(), and turns its result into the exit status.

import 'dotenv/config';
import process from 'node:process';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { run, type Output } from './run.js';

const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const config = loadConfig(process.env);
const log = createLogger(config.logLevel);

process.exitCode = await run(process.argv.slice(2), {
  io: consoleOutput,
  log,
  config,
});
