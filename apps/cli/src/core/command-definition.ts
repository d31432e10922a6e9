/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * A definition combines the argument specification, the validation schema
 * and the handler. `defineCommand` binds them into a runnable command.
 */

import type { z } from 'zod';
import type { BaseOptions } from '../lib/base-options-schema';
import { initializeLogger } from '../lib/logger';
import { createArgParser } from './io/arg-parser';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number' | 'array';
  description: string;
  default?: string | number | boolean;
  choices?: readonly string[];
  required?: boolean;
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
  /** Names for leading positional arguments */
  positional?: string[];
  /** Name that collects the positional arguments left after `positional` */
  variadic?: string;
}

/**
 * What help generation needs to know about a command
 */
export interface CommandHelp {
  name: string;
  description: string;
  argSpec: ArgSpec;
  examples: string[];
}

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 */
export interface CommandDefinition<TOptions extends BaseOptions> extends CommandHelp {
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  /** Resolves to the process exit code */
  handler: (options: TOptions) => Promise<number>;
}

/**
 * A command ready to run against raw argv
 */
export interface Command extends CommandHelp {
  execute(argv: string[]): Promise<number>;
}

/**
 * Bind a definition to its parser. The logger is initialized from the
 * parsed options before the handler runs.
 */
export function defineCommand<TOptions extends BaseOptions>(
  definition: CommandDefinition<TOptions>
): Command {
  const parse = createArgParser(definition);
  return {
    name: definition.name,
    description: definition.description,
    argSpec: definition.argSpec,
    examples: definition.examples,
    async execute(argv: string[]): Promise<number> {
      const options = parse(argv);
      initializeLogger(options.verbose ? 'debug' : undefined);
      return definition.handler(options);
    },
  };
}

/**
 * Common argument definitions that can be reused across commands
 */
export const commonArgs = {
  config: {
    type: 'string' as const,
    description: 'Services config file (or set SVCPLAN_CONFIG)',
  },
  verbose: {
    type: 'boolean' as const,
    description: 'Enable verbose output and debug logging',
    default: false,
  },
  output: {
    type: 'string' as const,
    description: 'Output format',
    choices: ['summary', 'json'] as const,
    default: 'summary',
  },
  quiet: {
    type: 'boolean' as const,
    description: 'Suppress output except errors',
    default: false,
  },
} as const;

/**
 * Common aliases that can be reused across commands
 */
export const commonAliases = {
  '-c': '--config',
  '-v': '--verbose',
  '-o': '--output',
  '-q': '--quiet',
} as const;
