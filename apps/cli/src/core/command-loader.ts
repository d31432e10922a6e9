/**
 * Command Loader - command registry and execution
 */

import type { Command } from './command-definition';
import { generateHelp } from './io/arg-parser';
import { printCaughtError } from './io/cli-logger';
import { checkCommand } from '../commands/check';
import { orderCommand } from '../commands/order';
import { unitsCommand } from '../commands/units';
import { expandCommand } from '../commands/expand';

/**
 * Registry of command definitions, in help order
 */
const commandRegistry = new Map<string, Command>(
  [checkCommand, orderCommand, unitsCommand, expandCommand].map(command => [command.name, command])
);

export function getAvailableCommands(): string[] {
  return [...commandRegistry.keys()];
}

export function loadCommand(name: string): Command {
  const command = commandRegistry.get(name);
  if (!command) {
    throw new Error(`Command '${name}' not found`);
  }
  return command;
}

/**
 * Execute a command and return the exit code.
 * Errors are printed here; 1 means the command could not run.
 */
export async function executeCommand(commandName: string, argv: string[]): Promise<number> {
  try {
    const command = loadCommand(commandName);

    if (argv.includes('--help') || argv.includes('-h')) {
      console.log(generateHelp(command));
      return 0;
    }

    return await command.execute(argv);
  } catch (error) {
    printCaughtError(error);
    return 1;
  }
}

/**
 * Global help: usage and one line per command
 */
export function generateGlobalHelp(): string {
  const commands = [...commandRegistry.values()];
  const width = Math.max(...commands.map(command => command.name.length)) + 2;

  return [
    'USAGE: svcplan <command> [options]',
    '',
    'COMMANDS:',
    ...commands.map(command => `  ${command.name.padEnd(width)}${command.description}`),
    '',
    'GLOBAL OPTIONS:',
    '  -h, --help     Show help',
    '  -v, --version  Show version',
    '',
    "Run 'svcplan <command> --help' for command options.",
  ].join('\n');
}
