/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Generates argument parsers from declarative command definitions:
 * `arg` does the tokenizing, the command's Zod schema does the validation.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgDefinition, ArgSpec, CommandHelp } from '../command-definition';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP: Record<ArgDefinition['type'], arg.Handler | [arg.Handler]> = {
  string: String,
  boolean: Boolean,
  number: Number,
  array: [String],
};

interface ParsableCommand<T> {
  argSpec: ArgSpec;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Create a parser function for a command
 */
export function createArgParser<T>(command: ParsableCommand<T>): (argv: string[]) => T {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    try {
      const { _: positional, ...named } = arg(argSpec, { argv, permissive: false });
      const normalized = normalizeArgs(named, positional, command.argSpec);
      return command.schema.parse(normalized);
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new Error(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match Zod schema expectations
 *
 * The arg library returns arguments with '--' prefix, but our schemas
 * expect camelCase property names.
 */
export function normalizeArgs(
  named: Record<string, unknown>,
  positional: readonly string[],
  spec: ArgSpec
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  const leading = spec.positional ?? [];
  leading.forEach((name, index) => {
    const value = positional[index];
    if (value !== undefined) {
      normalized[name] = value;
    }
  });
  if (spec.variadic) {
    normalized[spec.variadic] = positional.slice(leading.length);
  }

  for (const [key, value] of Object.entries(named)) {
    if (value !== undefined) {
      normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
    }
  }

  // Apply defaults from spec
  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from command definition
 */
export function generateHelp(command: CommandHelp): string {
  const lines: string[] = [];

  const usage = [
    command.name,
    ...(command.argSpec.positional ?? []).map(name => `<${name}>`),
    ...(command.argSpec.variadic ? [`<${command.argSpec.variadic}...>`] : []),
    '[options]',
  ];
  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push(`USAGE: svcplan ${usage.join(' ')}`);
  lines.push('');
  lines.push('OPTIONS:');

  const keyStrings = Object.keys(command.argSpec.args).map(key => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return aliases.length > 0 ? `${aliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...keyStrings.map(key => key.length)) + 2;

  Object.values(command.argSpec.args).forEach((def, index) => {
    let description = def.description;
    if (def.choices) {
      description += ` (${def.choices.join(', ')})`;
    }
    if (def.default !== undefined) {
      description += ` [default: ${def.default}]`;
    }
    if (def.required) {
      description += ' (required)';
    }
    lines.push(`  ${(keyStrings[index] ?? '').padEnd(width)}${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
