/**
 * @svcplan/resolver
 *
 * Service dependency resolution and cross-service validation
 *
 * Provides:
 * - ServiceCatalog: registry of service descriptors with a capability index
 * - resolveServices: startup order, diagnostics and supervisor directives
 * - The individual stages (resolver, graph, cycle detector, sorter, validator)
 * - expandRequirements: close a service list over its hard requirements
 */

export { ServiceCatalog, createDefaultCatalog } from './catalog';
export { catalogFromConfig } from './from-config';

export { findProviders, resolveDependency, resolveAll } from './capability-resolver';
export { DependencyGraph, buildDependencyGraph, type DirectedGraph } from './dependency-graph';
export { detectCycle } from './cycle-detector';
export { topologicalSort, type SortResult } from './topological-sort';

export {
  validateServices,
  isValidDomain,
  MIN_UNPRIVILEGED_PORT,
  MAX_PORT,
  type ServiceValidatorOptions,
} from './service-validator';
export { diagnoseDependencies, unknownServiceIssues } from './dependency-diagnostics';
export { aggregate, cycleIssue, isValidReport, summarizeReport, type GraphResult } from './diagnostics';

export { supervisorDirective, supervisorDirectives } from './supervisor';
export {
  expandRequirements,
  type ExpansionResult,
  type UnresolvedRequirement,
} from './expand-requirements';

export { resolveServices, type ResolveOptions, type Resolution } from './resolve';
