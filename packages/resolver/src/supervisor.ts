/**
 * Ordering and conflict lists for the process supervisor
 */

import { uniqueInOrder, type ResolvedDependency, type ServiceName, type SupervisorDirective } from '@svcplan/core';
import type { ServiceCatalog } from './catalog';

export function supervisorDirective(catalog: ServiceCatalog, dep: ResolvedDependency): SupervisorDirective {
  return {
    wants: [...dep.requires],
    after: catalog.sortByRank(uniqueInOrder([...dep.requires, ...dep.afterServices])),
    conflicts: [...dep.conflicts],
  };
}

/**
 * Directives keyed by service, in registration order
 */
export function supervisorDirectives(
  catalog: ServiceCatalog,
  resolved: readonly ResolvedDependency[]
): Record<ServiceName, SupervisorDirective> {
  const directives: Record<ServiceName, SupervisorDirective> = {};
  for (const dep of resolved) {
    directives[dep.service] = supervisorDirective(catalog, dep);
  }
  return directives;
}
