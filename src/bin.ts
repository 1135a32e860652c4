#!/usr/bin/env node
import { run } from './cli';
import { describeError } from './errors';

void run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exitCode = 1;
  }
);
