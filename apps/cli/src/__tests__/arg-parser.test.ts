import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createArgParser, generateHelp, kebabToCamel, normalizeArgs } from '../core/io/arg-parser';
import type { ArgSpec } from '../core/command-definition';

const spec: ArgSpec = {
  args: {
    '--config': { type: 'string', description: 'Config file' },
    '--dry-run': { type: 'boolean', description: 'Preview only', default: false },
    '--retries': { type: 'number', description: 'Retry count' },
  },
  aliases: { '-c': '--config' },
  variadic: 'services',
};

const schema = z.object({
  config: z.string().optional(),
  dryRun: z.boolean(),
  retries: z.number().int().optional(),
  services: z.array(z.string()).min(1, 'at least one service name is required'),
});

describe('kebabToCamel', () => {
  it('should convert kebab-case to camelCase', () => {
    expect(kebabToCamel('dry-run')).toBe('dryRun');
    expect(kebabToCamel('config')).toBe('config');
  });
});

describe('normalizeArgs', () => {
  it('should strip dashes, collect positionals and apply defaults', () => {
    expect(normalizeArgs({ '--config': 'a.json' }, ['gitea', 'mastodon'], spec)).toEqual({
      config: 'a.json',
      dryRun: false,
      services: ['gitea', 'mastodon'],
    });
  });

  it('should map leading positionals by name', () => {
    const positionalSpec: ArgSpec = { args: {}, positional: ['command'], variadic: 'rest' };
    expect(normalizeArgs({}, ['run', 'a', 'b'], positionalSpec)).toEqual({ command: 'run', rest: ['a', 'b'] });
  });
});

describe('createArgParser', () => {
  const parse = createArgParser({ argSpec: spec, schema });

  it('should parse flags, aliases and positionals', () => {
    expect(parse(['-c', 'services.json', '--dry-run', '--retries', '3', 'gitea'])).toEqual({
      config: 'services.json',
      dryRun: true,
      retries: 3,
      services: ['gitea'],
    });
  });

  it('should reject unknown options', () => {
    expect(() => parse(['--colour', 'gitea'])).toThrow(/^Invalid arguments: unknown or unexpected option: --colour$/i);
  });

  it('should report schema failures by path', () => {
    expect(() => parse([])).toThrow('Invalid arguments:\n  services: at least one service name is required');
  });
});

describe('generateHelp', () => {
  it('should list options, defaults and examples', () => {
    const help = generateHelp({
      name: 'demo',
      description: 'Demonstrate help output',
      argSpec: {
        args: {
          '--config': { type: 'string', description: 'Config file', required: true },
          '--output': { type: 'string', description: 'Output format', choices: ['summary', 'json'], default: 'summary' },
        },
        aliases: { '-c': '--config' },
        variadic: 'services',
      },
      examples: ['svcplan demo -c services.json gitea'],
    });

    expect(help).toBe([
      'demo - Demonstrate help output',
      '',
      'USAGE: svcplan demo <services...> [options]',
      '',
      'OPTIONS:',
      '  -c, --config  Config file (required)',
      '  --output      Output format (summary, json) [default: summary]',
      '',
      'EXAMPLES:',
      '  svcplan demo -c services.json gitea',
    ].join('\n'));
  });
});
