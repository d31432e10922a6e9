/**
 * Expand Command - add the providers a list of services needs
 */

import { z } from 'zod';
import { createDefaultCatalog, expandRequirements } from '@svcplan/resolver';
import { defineCommand, commonArgs, commonAliases } from '../core/command-definition';
import { formatExpansion } from '../core/io/output-formatter';
import { BaseOptionsSchema, ConfigExtensions } from '../lib/base-options-schema';
import { createComponentLogger } from '../lib/logger';
import { loadServicesContext } from '../lib/services-context';
import { useColors } from './shared';

const ExpandOptionsSchema = BaseOptionsSchema.extend({
  ...ConfigExtensions,
  services: z.array(z.string().min(1)).min(1, 'at least one service name is required'),
});

export type ExpandOptions = z.output<typeof ExpandOptionsSchema>;

async function expandHandler(options: ExpandOptions): Promise<number> {
  const logger = createComponentLogger('expand');
  // The catalog comes from the config when one is given
  const catalog = options.config ? loadServicesContext(options.config).catalog : createDefaultCatalog();

  const result = expandRequirements(catalog, options.services);
  logger.debug('Expanded requirements', { requested: options.services, added: result.added });

  console.log(formatExpansion(result, {
    format: options.output,
    quiet: options.quiet,
    verbose: options.verbose,
    colors: useColors(),
  }));
  return result.unresolved.length === 0 ? 0 : 2;
}

export const expandCommand = defineCommand({
  name: 'expand',
  description: 'Add catalog providers for every unmet required capability',
  schema: ExpandOptionsSchema,
  argSpec: {
    args: {
      '--config': commonArgs.config,
      '--output': commonArgs.output,
      '--verbose': commonArgs.verbose,
    },
    aliases: commonAliases,
    variadic: 'services',
  },
  examples: [
    'svcplan expand mastodon',
    'svcplan expand gitea keycloak --config services.json',
  ],
  handler: expandHandler,
});
