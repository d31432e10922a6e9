#!/usr/bin/env tsx
/**
 * svcplan CLI entry point
 */

import { runCli } from './core/run-cli';
import { printError } from './core/io/cli-logger';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
