/**
 * Top-level argument handling: global flags, then dispatch to a command
 */

import chalk from 'chalk';
import pkg from '../../package.json';
import { executeCommand, getAvailableCommands, generateGlobalHelp } from './command-loader';
import { printError } from './io/cli-logger';

export const VERSION: string = pkg.version;

function printVersion(): void {
  console.log(`svcplan v${VERSION}`);
}

function printHelp(): void {
  console.log(`${chalk.bold('svcplan')} ${chalk.dim(`v${VERSION}`)} | service dependency resolution and validation`);
  console.log(chalk.dim('─'.repeat(56)));
  console.log();
  console.log(generateGlobalHelp());
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(args: string[]): Promise<number> {
  const [command, ...rest] = args;

  if (command === undefined || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (command === '--version' || command === '-v') {
    printVersion();
    return 0;
  }

  const availableCommands = getAvailableCommands();
  if (!availableCommands.includes(command)) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${availableCommands.join(', ')}`);
    console.log(`Run 'svcplan --help' for more information.`);
    return 1;
  }

  return executeCommand(command, rest);
}
