/**
 * Base Options Schema - Zod schema for common command options
 *
 * Every command extends this schema, so handlers always see these fields.
 */

import { z } from 'zod';

export const OUTPUT_FORMATS = ['summary', 'json'] as const;

/**
 * Base Zod schema for options common to all commands
 *
 * Note: Fields are optional to allow CLI args to be omitted,
 * but have defaults so they're always defined at runtime
 */
export const BaseOptionsSchema = z.object({
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  output: z.enum(OUTPUT_FORMATS).optional().default('summary'),
});

export type BaseOptions = z.output<typeof BaseOptionsSchema>;

/**
 * Extensions shared by commands that read a services config
 */
export const ConfigExtensions = {
  config: z.string().min(1).optional(),
} as const;
