/**
 * Diagnostics Aggregator
 *
 * Merges graph-side and validation issues into one report. Any fatal issue,
 * a cycle included, withholds the startup order.
 */

import {
  fatalIssue,
  formatCyclePath,
  isFatal,
  type Report,
  type ServiceName,
  type ValidationIssue,
} from '@svcplan/core';
import type { SortResult } from './topological-sort';

/**
 * What the graph side hands to the aggregator
 */
export interface GraphResult {
  issues: ValidationIssue[];
  /** Absent when sorting was skipped */
  sort?: SortResult;
}

export function cycleIssue(path: readonly ServiceName[]): ValidationIssue {
  const [first] = path;
  return fatalIssue(
    'CyclicDependency',
    first ?? '',
    `Circular dependency detected: ${formatCyclePath(path)}`,
    [...path]
  );
}

export function aggregate(graphResult: GraphResult, validationIssues: readonly ValidationIssue[]): Report {
  const { sort } = graphResult;
  const all: ValidationIssue[] = [...graphResult.issues];
  if (sort && !sort.success) {
    all.push(cycleIssue(sort.error.path));
  }
  all.push(...validationIssues);

  const fatal = all.filter(isFatal);
  const warnings = all.filter(issue => !isFatal(issue));

  const startupOrder = fatal.length === 0 && sort?.success ? [...sort.data] : null;

  return { fatal, warnings, startupOrder };
}

export function isValidReport(report: Report): boolean {
  return report.fatal.length === 0;
}

/**
 * Multi-line message for the configuration-acceptance layer
 */
export function summarizeReport(report: Report): string {
  if (report.fatal.length === 0) {
    return 'Service configuration is valid';
  }
  const lines = ['Service configuration is invalid:'];
  for (const issue of report.fatal) {
    lines.push(`  [${issue.code}] ${issue.message}`);
  }
  return lines.join('\n');
}
