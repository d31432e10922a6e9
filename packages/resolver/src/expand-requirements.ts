/**
 * Requirement expansion
 *
 * Closes a requested service list over hard requirements by picking a
 * provider for every unmet capability.
 */

import { UnknownServiceError, type Capability, type ServiceName } from '@svcplan/core';
import type { ServiceCatalog } from './catalog';

export interface UnresolvedRequirement {
  service: ServiceName;
  capability: Capability;
}

export interface ExpansionResult {
  /** Requested plus added services, in registration order */
  services: ServiceName[];
  /** Services added to satisfy requirements, in the order they were chosen */
  added: ServiceName[];
  unresolved: UnresolvedRequirement[];
}

function conflictsWith(catalog: ServiceCatalog, candidate: ServiceName, chosen: ReadonlySet<ServiceName>): boolean {
  const declared = catalog.get(candidate).conflicts;
  for (const name of chosen) {
    if (declared.includes(name) || catalog.get(name).conflicts.includes(candidate)) {
      return true;
    }
  }
  return false;
}

/**
 * For each unmet required capability, add the lowest-ranked catalog provider
 * that conflicts with nothing already chosen. Repeats until no service is added.
 *
 * @throws UnknownServiceError if a requested service is not in the catalog
 */
export function expandRequirements(
  catalog: ServiceCatalog,
  requested: readonly ServiceName[]
): ExpansionResult {
  for (const name of requested) {
    if (!catalog.has(name)) throw new UnknownServiceError(name);
  }

  const chosen = new Set<ServiceName>(requested);
  const added: ServiceName[] = [];
  const unresolved: UnresolvedRequirement[] = [];
  const queue: ServiceName[] = catalog.sortByRank(chosen);

  while (queue.length > 0) {
    const service = queue.shift();
    if (service === undefined) break;

    for (const capability of catalog.get(service).requires) {
      const providers = catalog.providersOf(capability);
      if (providers.some(provider => chosen.has(provider))) continue;

      const pick = providers.find(provider => !conflictsWith(catalog, provider, chosen));
      if (pick === undefined) {
        unresolved.push({ service, capability });
        continue;
      }

      chosen.add(pick);
      added.push(pick);
      queue.push(pick);
    }
  }

  return {
    services: catalog.sortByRank(chosen),
    added,
    unresolved,
  };
}
