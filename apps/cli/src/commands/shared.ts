import chalk from 'chalk';
import { summarizeReport } from '@svcplan/resolver';
import type { Report } from '@svcplan/core';
import { printError } from '../core/io/cli-logger';

/**
 * Colour only when writing to a terminal that supports it
 */
export function useColors(): boolean {
  return process.stdout.isTTY === true && chalk.level > 0;
}

/**
 * Commands that need a valid configuration stop here with exit code 2
 */
export function rejectInvalidReport(report: Report): number {
  printError(summarizeReport(report));
  return 2;
}
