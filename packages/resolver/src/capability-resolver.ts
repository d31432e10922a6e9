/**
 * Capability Resolver
 *
 * Maps the capabilities a service requires or would like onto the enabled
 * services that provide them.
 */

import { uniqueInOrder, type Capability, type ResolvedDependency, type ServiceName } from '@svcplan/core';
import type { ServiceCatalog } from './catalog';

/**
 * Enabled services providing a capability, in registration order.
 * An empty result is valid; the caller decides whether that is fatal.
 */
export function findProviders(
  catalog: ServiceCatalog,
  capability: Capability,
  enabled: ReadonlySet<ServiceName>
): ServiceName[] {
  return catalog.providersOf(capability).filter(name => enabled.has(name));
}

/**
 * Resolve one enabled service against the enabled set.
 *
 * A service that provides a capability it requires satisfies itself; no
 * edge to itself is recorded.
 */
export function resolveDependency(
  catalog: ServiceCatalog,
  service: ServiceName,
  enabled: ReadonlySet<ServiceName>
): ResolvedDependency {
  const descriptor = catalog.get(service);

  const requires: ServiceName[] = [];
  const missingRequirements: Capability[] = [];
  for (const capability of descriptor.requires) {
    const providers = findProviders(catalog, capability, enabled);
    if (providers.length === 0) {
      missingRequirements.push(capability);
    }
    requires.push(...providers.filter(provider => provider !== service));
  }

  const optionalProviders: ServiceName[] = [];
  const missingOptional: Capability[] = [];
  for (const capability of descriptor.optional) {
    const providers = findProviders(catalog, capability, enabled);
    if (providers.length === 0) {
      missingOptional.push(capability);
    }
    optionalProviders.push(...providers.filter(provider => provider !== service));
  }

  return {
    service,
    requires: catalog.sortByRank(uniqueInOrder(requires)),
    afterServices: descriptor.after.filter(name => enabled.has(name) && name !== service),
    conflicts: [...descriptor.conflicts],
    provides: [...descriptor.provides],
    missingRequirements,
    optionalProviders: catalog.sortByRank(uniqueInOrder(optionalProviders)),
    missingOptional,
  };
}

/**
 * Resolve every enabled catalog service, in registration order
 */
export function resolveAll(
  catalog: ServiceCatalog,
  enabled: ReadonlySet<ServiceName>
): ResolvedDependency[] {
  return catalog
    .sortByRank(enabled)
    .filter(name => catalog.has(name))
    .map(name => resolveDependency(catalog, name, enabled));
}
