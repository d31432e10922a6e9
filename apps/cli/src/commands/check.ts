/**
 * Check Command - validate a services config and print the full report
 */

import { z } from 'zod';
import { isValidReport, resolveServices } from '@svcplan/resolver';
import { defineCommand, commonArgs, commonAliases } from '../core/command-definition';
import { formatReport } from '../core/io/output-formatter';
import { BaseOptionsSchema, ConfigExtensions } from '../lib/base-options-schema';
import { createComponentLogger, toEngineLogger } from '../lib/logger';
import { loadServicesContext } from '../lib/services-context';
import { useColors } from './shared';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

const CheckOptionsSchema = BaseOptionsSchema.extend(ConfigExtensions);

export type CheckOptions = z.output<typeof CheckOptionsSchema>;

// =====================================================================
// COMMAND HANDLER
// =====================================================================

async function checkHandler(options: CheckOptions): Promise<number> {
  const logger = createComponentLogger('check');
  const { source, config, catalog } = loadServicesContext(options.config);
  logger.debug('Loaded services config', {
    source,
    enabled: config.services.length,
    disabled: config.disabled.length,
  });

  const { report } = resolveServices({
    catalog,
    services: config.services,
    privilegedPorts: config.privilegedPorts,
    logger: toEngineLogger(logger),
  });

  const output = formatReport(report, {
    format: options.output,
    quiet: options.quiet,
    verbose: options.verbose,
    colors: useColors(),
  });
  if (output) {
    console.log(output);
  }

  return isValidReport(report) ? 0 : 2;
}

// =====================================================================
// COMMAND DEFINITION
// =====================================================================

export const checkCommand = defineCommand({
  name: 'check',
  description: 'Validate a services config and report every issue found',
  schema: CheckOptionsSchema,
  argSpec: {
    args: {
      '--config': commonArgs.config,
      '--output': commonArgs.output,
      '--verbose': commonArgs.verbose,
      '--quiet': commonArgs.quiet,
    },
    aliases: commonAliases,
  },
  examples: [
    'svcplan check --config services.json',
    'svcplan check -c services.json --output json',
  ],
  handler: checkHandler,
});
