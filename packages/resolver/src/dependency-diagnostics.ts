/**
 * Diagnostics derived from resolved dependencies: missing providers,
 * conflicts between enabled services and unmet optional capabilities.
 */

import {
  fatalIssue,
  warningIssue,
  type ResolvedDependency,
  type ServiceName,
  type ValidationIssue,
} from '@svcplan/core';
import type { ServiceCatalog } from './catalog';

function missingRequirementIssues(dep: ResolvedDependency): ValidationIssue[] {
  return dep.missingRequirements.map(capability =>
    fatalIssue(
      'MissingRequiredCapability',
      dep.service,
      `Service '${dep.service}' requires capability '${capability}' but no enabled service provides it`
    )
  );
}

/**
 * One issue per unordered pair of enabled services where either side lists
 * the other as conflicting
 */
function conflictIssues(
  catalog: ServiceCatalog,
  resolved: readonly ResolvedDependency[],
  enabled: ReadonlySet<ServiceName>
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const reported = new Set<string>();

  for (const dep of resolved) {
    for (const other of dep.conflicts) {
      if (other === dep.service || !enabled.has(other)) continue;

      const [first, second] = catalog.sortByRank([dep.service, other]);
      if (first === undefined || second === undefined) continue;
      const key = `${first}\u0000${second}`;
      if (reported.has(key)) continue;
      reported.add(key);

      issues.push(fatalIssue(
        'ConflictingServices',
        first,
        `Service '${first}' conflicts with '${second}'; enable only one of them`,
        [second]
      ));
    }
  }

  return issues;
}

function missingOptionalIssues(catalog: ServiceCatalog, dep: ResolvedDependency): ValidationIssue[] {
  if (dep.missingOptional.length === 0) return [];

  const candidates = catalog.sortByRank(
    new Set(dep.missingOptional.flatMap(capability => catalog.providersOf(capability)))
  ).filter(name => name !== dep.service);

  const message = candidates.length > 0
    ? `Service '${dep.service}' could benefit from: ${candidates.join(', ')}`
    : `Service '${dep.service}' has optional capabilities no known service provides: ${dep.missingOptional.join(', ')}`;

  return [warningIssue('MissingOptionalCapability', dep.service, message, candidates)];
}

/**
 * Issues for enabled names that are not in the catalog
 */
export function unknownServiceIssues(
  catalog: ServiceCatalog,
  names: readonly ServiceName[]
): ValidationIssue[] {
  return names
    .filter(name => !catalog.has(name))
    .map(name => fatalIssue('UnknownService', name, `Service '${name}' is not in the service catalog`));
}

/**
 * Graph-side diagnostics for every resolved service: missing requirements
 * (per service, per capability), then conflicts, then optional warnings
 */
export function diagnoseDependencies(
  catalog: ServiceCatalog,
  resolved: readonly ResolvedDependency[],
  enabled: ReadonlySet<ServiceName>
): ValidationIssue[] {
  return [
    ...resolved.flatMap(missingRequirementIssues),
    ...conflictIssues(catalog, resolved, enabled),
    ...resolved.flatMap(dep => missingOptionalIssues(catalog, dep)),
  ];
}
