/**
 * User-facing status lines. Diagnostics go through the winston logger in
 * lib/logger.ts; these are the messages a user is meant to read.
 */

import chalk from 'chalk';
import { ConfigurationError } from '@svcplan/core';

export function printError(message: string): void {
  console.error(chalk.red(`❌ ${message}`));
}

/**
 * Print a caught error. Configuration errors bring their own layout.
 */
export function printCaughtError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(error.toString()));
  } else if (error instanceof Error) {
    printError(error.message);
  } else {
    printError(String(error));
  }
}
