/**
 * Diagnostics produced by resolution and validation
 */

import type { ServiceName } from './identifiers';

export const FATAL_ISSUE_CODES = [
  'MissingRequiredCapability',
  'ConflictingServices',
  'CyclicDependency',
  'PortOutOfRange',
  'PortCollision',
  'DataDirCollision',
  'RelativeDataDir',
  'InvalidDomainFormat',
  'MissingDatabaseCredential',
  'InconsistentSslConfig',
  'UnknownService',
  'DuplicateService',
] as const;

export const WARNING_ISSUE_CODES = [
  'DevModeWithProdLikeDomain',
  'DefaultDomainUnchanged',
  'UnencryptedDatabaseLink',
  'SslDisabledInProd',
  'MissingOptionalCapability',
] as const;

export type FatalIssueCode = typeof FATAL_ISSUE_CODES[number];
export type WarningIssueCode = typeof WARNING_ISSUE_CODES[number];
export type IssueCode = FatalIssueCode | WarningIssueCode;

export type IssueSeverity = 'fatal' | 'warning';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: IssueCode;
  service: ServiceName;
  message: string;
  /** Other services the issue names (collision partner, conflict, cycle path) */
  related?: ServiceName[];
}

export function fatalIssue(
  code: FatalIssueCode,
  service: ServiceName,
  message: string,
  related?: ServiceName[]
): ValidationIssue {
  return related
    ? { severity: 'fatal', code, service, message, related }
    : { severity: 'fatal', code, service, message };
}

export function warningIssue(
  code: WarningIssueCode,
  service: ServiceName,
  message: string,
  related?: ServiceName[]
): ValidationIssue {
  return related
    ? { severity: 'warning', code, service, message, related }
    : { severity: 'warning', code, service, message };
}

export function isFatal(issue: ValidationIssue): boolean {
  return issue.severity === 'fatal';
}

/**
 * Outcome of one resolution. `startupOrder` is null whenever `fatal` is not
 * empty.
 */
export interface Report {
  fatal: ValidationIssue[];
  warnings: ValidationIssue[];
  startupOrder: ServiceName[] | null;
}
