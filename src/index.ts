#!/usr/bin/env node
import { createProgram, normalizeArgv } from './cli.js';
import { formatError } from './lib/errors.js';

const program = createProgram();

void program.parseAsync(normalizeArgv(process.argv)).catch((error: unknown) => {
  console.error(`error: ${formatError(error)}`);
  process.exitCode = 2;
});
