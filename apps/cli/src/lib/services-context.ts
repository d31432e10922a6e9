/**
 * Loads what the commands work on: the services config and the catalog it
 * selects.
 */

import * as path from 'path';
import { ConfigurationError, loadServicesConfig, type ServicesConfig } from '@svcplan/core';
import { catalogFromConfig, type ServiceCatalog } from '@svcplan/resolver';

export interface ServicesContext {
  source: string;
  config: ServicesConfig;
  catalog: ServiceCatalog;
}

/**
 * Config path from --config, falling back to SVCPLAN_CONFIG
 *
 * @throws ConfigurationError if neither is set
 */
export function resolveConfigPath(
  option: string | undefined,
  env: Record<string, string | undefined> = process.env
): string {
  const configPath = option ?? env.SVCPLAN_CONFIG;
  if (!configPath) {
    throw new ConfigurationError(
      'Services config not specified',
      undefined,
      'Use --config <file> or set the SVCPLAN_CONFIG environment variable'
    );
  }
  return path.resolve(configPath);
}

export function loadServicesContext(
  option: string | undefined,
  env: Record<string, string | undefined> = process.env
): ServicesContext {
  const source = resolveConfigPath(option, env);
  const config = loadServicesConfig(source, env);
  return { source, config, catalog: catalogFromConfig(config) };
}
