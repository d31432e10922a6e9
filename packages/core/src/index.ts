/**
 * @svcplan/core
 *
 * Shared data model for the service dependency engine: names, descriptors,
 * instances, diagnostics, errors, the Logger interface and config loading.
 */

export type { ServiceName, Capability } from './identifiers';
export { isServiceName, uniqueInOrder } from './identifiers';

export type {
  ServiceDescriptor,
  ServiceDescriptorInput,
  DatabaseKind,
  DatabaseSettings,
  SslSettings,
  ServiceMode,
  ServiceInstance,
  PrivilegedPortGrants,
  EdgeKind,
  DependencyEdge,
  ResolvedDependency,
  SupervisorDirective,
} from './service-types';
export { DATABASE_KINDS, PASSWORD_DATABASE_KINDS } from './service-types';

export type {
  FatalIssueCode,
  WarningIssueCode,
  IssueCode,
  IssueSeverity,
  ValidationIssue,
  Report,
} from './issues';
export {
  FATAL_ISSUE_CODES,
  WARNING_ISSUE_CODES,
  fatalIssue,
  warningIssue,
  isFatal,
} from './issues';

export {
  SvcplanError,
  ValidationError,
  UnknownServiceError,
  CyclicDependencyError,
  formatCyclePath,
} from './errors';

export type { Logger } from './logger';
export { silentLogger } from './logger';

// Configuration
export { ConfigurationError } from './config/configuration-error';
export {
  validateServicesConfig,
  validateServiceDescriptor,
  formatErrors,
  type ValidationResult,
} from './config/config-validator';
export {
  parseServicesConfig,
  loadServicesConfig,
  resolveEnvVars,
  type ServicesConfig,
} from './config/config-loader';
