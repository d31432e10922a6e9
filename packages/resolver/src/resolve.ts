/**
 * Service resolution entry point
 *
 * Catalog lookups → capability resolution → graph → cycle check and sort,
 * and independently cross-service validation, merged into one report.
 * Pure: everything it reads is passed in.
 */

import {
  CyclicDependencyError,
  silentLogger,
  type Logger,
  type PrivilegedPortGrants,
  type Report,
  type ResolvedDependency,
  type ServiceInstance,
  type ServiceName,
  type SupervisorDirective,
} from '@svcplan/core';
import type { ServiceCatalog } from './catalog';
import { resolveAll } from './capability-resolver';
import { buildDependencyGraph } from './dependency-graph';
import { detectCycle } from './cycle-detector';
import { topologicalSort, type SortResult } from './topological-sort';
import { validateServices } from './service-validator';
import { diagnoseDependencies, unknownServiceIssues } from './dependency-diagnostics';
import { aggregate } from './diagnostics';
import { supervisorDirectives } from './supervisor';

export interface ResolveOptions {
  catalog: ServiceCatalog;
  /** Enabled service instances, in any order */
  services: readonly ServiceInstance[];
  privilegedPorts?: PrivilegedPortGrants;
  logger?: Logger;
}

export interface Resolution {
  report: Report;
  /** One per enabled catalog service, in registration order */
  dependencies: ResolvedDependency[];
  directives: Record<ServiceName, SupervisorDirective>;
}

export function resolveServices(options: ResolveOptions): Resolution {
  const { catalog } = options;
  const logger = (options.logger ?? silentLogger).child({ component: 'resolver' });

  // Registration order, so the result does not depend on input order
  const instances = [...options.services].sort((a, b) => catalog.rank(a.name) - catalog.rank(b.name));
  const names = instances.map(instance => instance.name);
  const enabled = new Set(names);

  const dependencies = resolveAll(catalog, enabled);
  const graph = buildDependencyGraph(catalog, dependencies);

  const graphIssues = [
    ...unknownServiceIssues(catalog, [...new Set(names)]),
    ...diagnoseDependencies(catalog, dependencies, enabled),
  ];

  // Fail fast on the first cycle; sorting would only rediscover it
  const cycle = detectCycle(graph);
  let sort: SortResult;
  if (cycle) {
    logger.debug('Dependency cycle found', { path: cycle });
    sort = { success: false, error: new CyclicDependencyError(cycle) };
  } else {
    sort = topologicalSort(graph);
  }

  const validationIssues = validateServices(instances, { privilegedPorts: options.privilegedPorts });
  const report = aggregate({ issues: graphIssues, sort }, validationIssues);

  logger.debug('Resolved services', {
    enabled: names.length,
    fatal: report.fatal.length,
    warnings: report.warnings.length,
    startupOrder: report.startupOrder,
  });

  return {
    report,
    dependencies,
    directives: supervisorDirectives(catalog, dependencies),
  };
}
