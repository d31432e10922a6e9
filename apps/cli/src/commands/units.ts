/**
 * Units Command - print the supervisor ordering directives per service
 */

import { z } from 'zod';
import { isValidReport, resolveServices } from '@svcplan/resolver';
import { defineCommand, commonArgs, commonAliases } from '../core/command-definition';
import { formatDirectives } from '../core/io/output-formatter';
import { BaseOptionsSchema, ConfigExtensions } from '../lib/base-options-schema';
import { createComponentLogger, toEngineLogger } from '../lib/logger';
import { loadServicesContext } from '../lib/services-context';
import { rejectInvalidReport, useColors } from './shared';

const UnitsOptionsSchema = BaseOptionsSchema.extend(ConfigExtensions);

export type UnitsOptions = z.output<typeof UnitsOptionsSchema>;

async function unitsHandler(options: UnitsOptions): Promise<number> {
  const { config, catalog } = loadServicesContext(options.config);
  const { report, directives } = resolveServices({
    catalog,
    services: config.services,
    privilegedPorts: config.privilegedPorts,
    logger: toEngineLogger(createComponentLogger('units')),
  });

  if (!isValidReport(report)) {
    return rejectInvalidReport(report);
  }

  console.log(formatDirectives(directives, {
    format: options.output,
    quiet: options.quiet,
    verbose: options.verbose,
    colors: useColors(),
  }));
  return 0;
}

export const unitsCommand = defineCommand({
  name: 'units',
  description: 'Print wants/after/conflicts directives for the process supervisor',
  schema: UnitsOptionsSchema,
  argSpec: {
    args: {
      '--config': commonArgs.config,
      '--output': commonArgs.output,
      '--verbose': commonArgs.verbose,
    },
    aliases: commonAliases,
  },
  examples: [
    'svcplan units --config services.json --output json',
  ],
  handler: unitsHandler,
});
