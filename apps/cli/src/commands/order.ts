/**
 * Order Command - print the startup order of the enabled services
 */

import { z } from 'zod';
import { resolveServices } from '@svcplan/resolver';
import { defineCommand, commonArgs, commonAliases } from '../core/command-definition';
import { formatStartupOrder } from '../core/io/output-formatter';
import { BaseOptionsSchema, ConfigExtensions } from '../lib/base-options-schema';
import { createComponentLogger, toEngineLogger } from '../lib/logger';
import { loadServicesContext } from '../lib/services-context';
import { rejectInvalidReport, useColors } from './shared';

const OrderOptionsSchema = BaseOptionsSchema.extend(ConfigExtensions);

export type OrderOptions = z.output<typeof OrderOptionsSchema>;

async function orderHandler(options: OrderOptions): Promise<number> {
  const { config, catalog } = loadServicesContext(options.config);
  const { report } = resolveServices({
    catalog,
    services: config.services,
    privilegedPorts: config.privilegedPorts,
    logger: toEngineLogger(createComponentLogger('order')),
  });

  if (!report.startupOrder) {
    return rejectInvalidReport(report);
  }

  console.log(formatStartupOrder(report.startupOrder, {
    format: options.output,
    quiet: options.quiet,
    verbose: options.verbose,
    colors: useColors(),
  }));
  return 0;
}

export const orderCommand = defineCommand({
  name: 'order',
  description: 'Print the startup order, one service per line',
  schema: OrderOptionsSchema,
  argSpec: {
    args: {
      '--config': commonArgs.config,
      '--output': commonArgs.output,
      '--verbose': commonArgs.verbose,
    },
    aliases: commonAliases,
  },
  examples: [
    'svcplan order --config services.json',
  ],
  handler: orderHandler,
});
