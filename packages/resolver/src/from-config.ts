/**
 * Bridge from a parsed services config to the resolver's inputs
 */

import type { ServicesConfig } from '@svcplan/core';
import { ServiceCatalog, createDefaultCatalog } from './catalog';

/**
 * Built-in catalog (unless disabled) extended with the file's own entries
 */
export function catalogFromConfig(config: Pick<ServicesConfig, 'useDefaultCatalog' | 'catalog'>): ServiceCatalog {
  return config.useDefaultCatalog
    ? createDefaultCatalog().extend(config.catalog)
    : new ServiceCatalog(config.catalog);
}
