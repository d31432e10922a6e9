/**
 * Cross-Service Validator
 *
 * Field-level checks across all enabled instances, independent of the
 * dependency graph. Every rule runs on every instance.
 */

import * as path from 'path';
import {
  PASSWORD_DATABASE_KINDS,
  fatalIssue,
  warningIssue,
  type PrivilegedPortGrants,
  type ServiceInstance,
  type ServiceName,
  type ValidationIssue,
} from '@svcplan/core';

export const MIN_UNPRIVILEGED_PORT = 1024;
export const MAX_PORT = 65535;

const DOMAIN_PATTERN = /^[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const DEFAULT_DOMAIN_PATTERN = /(^|\.)example\.(com|org|net)$/i;
const LOCAL_TLDS = new Set(['localhost', 'local', 'test', 'example', 'invalid', 'internal', 'lan', 'home', 'arpa']);
const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

export interface ServiceValidatorOptions {
  /** Ports below 1024 explicitly granted per service */
  privilegedPorts?: PrivilegedPortGrants;
}

type Rule = (instance: ServiceInstance, options: ServiceValidatorOptions) => ValidationIssue | null;

export function isValidDomain(domain: string): boolean {
  return DOMAIN_PATTERN.test(domain);
}

function normalizeDataDir(dataDir: string): string {
  const normalized = path.posix.normalize(dataDir);
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

function topLevelDomain(domain: string): string {
  const labels = domain.toLowerCase().split('.');
  return labels[labels.length - 1] ?? '';
}

function isLocalHost(host: string): boolean {
  return LOCAL_HOSTS.has(host.toLowerCase()) || host.startsWith('/');
}

const checkPortRange: Rule = (instance, options) => {
  const { name, port } = instance;
  const grants = options.privilegedPorts;
  const granted = grants && Object.hasOwn(grants, name) ? grants[name] ?? [] : [];
  if (Number.isInteger(port) && port >= 1 && port < MIN_UNPRIVILEGED_PORT && granted.includes(port)) {
    return null;
  }
  if (Number.isInteger(port) && port >= MIN_UNPRIVILEGED_PORT && port <= MAX_PORT) {
    return null;
  }
  return fatalIssue(
    'PortOutOfRange',
    name,
    `Service '${name}' main port ${port} must be between ${MIN_UNPRIVILEGED_PORT}-${MAX_PORT} (non-privileged range)`
  );
};

const checkDataDirAbsolute: Rule = ({ name, dataDir }) =>
  path.posix.isAbsolute(dataDir)
    ? null
    : fatalIssue('RelativeDataDir', name, `Service '${name}' dataDir path '${dataDir}' should be absolute and valid`);

const checkDomainFormat: Rule = ({ name, domain }) =>
  domain === undefined || isValidDomain(domain)
    ? null
    : fatalIssue('InvalidDomainFormat', name, `Service '${name}' domain '${domain}' is not a valid domain name format`);

const checkDatabaseCredential: Rule = ({ name, database }) => {
  if (!database || !PASSWORD_DATABASE_KINDS.includes(database.kind) || database.passwordFile) {
    return null;
  }
  return fatalIssue(
    'MissingDatabaseCredential',
    name,
    `Service '${name}' database type '${database.kind}' requires passwordFile to be set`
  );
};

const checkSslConsistency: Rule = ({ name, ssl }) => {
  if (!ssl || !ssl.enabled || ssl.acmeHost) return null;
  if (ssl.certificate && ssl.certificateKey) return null;
  return fatalIssue(
    'InconsistentSslConfig',
    name,
    `Service '${name}' SSL enabled without ACME requires both certificate and certificateKey paths`
  );
};

const checkDevModeDomain: Rule = ({ name, mode, domain }) => {
  if (mode !== 'dev' || domain === undefined || !isValidDomain(domain)) return null;
  if (LOCAL_TLDS.has(topLevelDomain(domain))) return null;
  return warningIssue(
    'DevModeWithProdLikeDomain',
    name,
    `Service '${name}' is in dev mode but domain '${domain}' looks like production`
  );
};

const checkDefaultDomain: Rule = ({ name, domain }) =>
  domain !== undefined && DEFAULT_DOMAIN_PATTERN.test(domain)
    ? warningIssue(
      'DefaultDomainUnchanged',
      name,
      `Service '${name}' is using default domain '${domain}', should be changed for production`
    )
    : null;

const checkDatabaseEncryption: Rule = ({ name, database }) => {
  if (!database || !PASSWORD_DATABASE_KINDS.includes(database.kind)) return null;
  if (isLocalHost(database.host) || database.tls) return null;
  return warningIssue(
    'UnencryptedDatabaseLink',
    name,
    `Service '${name}' database connection to '${database.host}' should use encryption`
  );
};

const checkSslInProduction: Rule = ({ name, mode, ssl }) =>
  mode === 'prod' && ssl && !ssl.enabled
    ? warningIssue('SslDisabledInProd', name, `Service '${name}' has SSL disabled in production mode - security risk`)
    : null;

const INSTANCE_RULES: readonly Rule[] = [
  checkPortRange,
  checkDataDirAbsolute,
  checkDomainFormat,
  checkDatabaseCredential,
  checkSslConsistency,
  checkDevModeDomain,
  checkDefaultDomain,
  checkDatabaseEncryption,
  checkSslInProduction,
];

/**
 * One issue per pair of distinct services sharing a key, attributed to the
 * later service of the pair
 */
function collisions(
  instances: readonly ServiceInstance[],
  keyOf: (instance: ServiceInstance) => string | number,
  issueFor: (earlier: ServiceName, later: ServiceName, key: string | number) => ValidationIssue
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seen = new Map<string | number, ServiceName[]>();

  for (const instance of instances) {
    const key = keyOf(instance);
    const owners = seen.get(key) ?? [];
    for (const owner of owners) {
      if (owner !== instance.name) {
        issues.push(issueFor(owner, instance.name, key));
      }
    }
    owners.push(instance.name);
    seen.set(key, owners);
  }

  return issues;
}

function duplicateServices(instances: readonly ServiceInstance[]): ValidationIssue[] {
  const counts = new Map<ServiceName, number>();
  for (const { name } of instances) counts.set(name, (counts.get(name) ?? 0) + 1);

  const issues: ValidationIssue[] = [];
  for (const [name, count] of counts) {
    if (count > 1) {
      issues.push(fatalIssue('DuplicateService', name, `Service '${name}' is enabled ${count} times`));
    }
  }
  return issues;
}

/**
 * Validate all enabled instances together.
 *
 * Per-instance rules come first (instance order, rule order), then port
 * collisions, then data directory collisions, then duplicate names.
 */
export function validateServices(
  instances: readonly ServiceInstance[],
  options: ServiceValidatorOptions = {}
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const instance of instances) {
    for (const rule of INSTANCE_RULES) {
      const issue = rule(instance, options);
      if (issue) issues.push(issue);
    }
  }

  issues.push(
    ...collisions(
      instances,
      instance => instance.port,
      (earlier, later, port) => fatalIssue(
        'PortCollision',
        later,
        `Port ${port} is already used by service '${earlier}', cannot assign to '${later}'`,
        [earlier]
      )
    )
  );

  issues.push(
    ...collisions(
      instances,
      instance => normalizeDataDir(instance.dataDir),
      (earlier, later, dataDir) => fatalIssue(
        'DataDirCollision',
        later,
        `Data directory '${dataDir}' is already used by service '${earlier}', cannot assign to '${later}'`,
        [earlier]
      )
    )
  );

  issues.push(...duplicateServices(instances));

  return issues;
}
