/**
 * Service data model
 *
 * Descriptors are the static half (what a service offers and needs), instances
 * are the per-configuration half (where and how an enabled service runs).
 */

import type { Capability, ServiceName } from './identifiers';

/**
 * Static description of a known service. Lists are duplicate-free and keep
 * their declared order.
 */
export interface ServiceDescriptor {
  readonly provides: readonly Capability[];
  readonly requires: readonly Capability[];
  /** Soft ordering: start after these services when they are enabled */
  readonly after: readonly ServiceName[];
  readonly conflicts: readonly ServiceName[];
  readonly optional: readonly Capability[];
}

/**
 * Descriptor as written by hand or in a config file; every list is optional.
 */
export type ServiceDescriptorInput = Partial<{
  [K in keyof ServiceDescriptor]: readonly string[];
}>;

export const DATABASE_KINDS = ['sqlite3', 'mysql', 'postgres', 'redis'] as const;
export type DatabaseKind = typeof DATABASE_KINDS[number];

/** Database kinds that authenticate with a password */
export const PASSWORD_DATABASE_KINDS: readonly DatabaseKind[] = ['mysql', 'postgres'];

export interface DatabaseSettings {
  kind: DatabaseKind;
  host: string;
  port?: number;
  name?: string;
  user: string;
  passwordFile?: string;
  /** Connection is encrypted (TLS or an equivalent tunnel) */
  tls?: boolean;
}

export interface SslSettings {
  enabled: boolean;
  certificate?: string;
  certificateKey?: string;
  acmeHost?: string;
}

export type ServiceMode = 'dev' | 'prod';

export interface ServiceInstance {
  name: ServiceName;
  port: number;
  dataDir: string;
  domain?: string;
  database?: DatabaseSettings;
  ssl?: SslSettings;
  mode: ServiceMode;
}

/**
 * Ports below 1024 explicitly granted per service, e.g. `{ traefik: [80, 443] }`
 */
export type PrivilegedPortGrants = Readonly<Record<ServiceName, readonly number[]>>;

export type EdgeKind = 'hard' | 'soft';

export interface DependencyEdge {
  from: ServiceName;
  to: ServiceName;
  kind: EdgeKind;
}

/**
 * A service's descriptor resolved against the enabled set.
 */
export interface ResolvedDependency {
  service: ServiceName;
  /** Enabled providers of the required capabilities */
  requires: ServiceName[];
  /** Declared `after` services that are enabled */
  afterServices: ServiceName[];
  /** Declared conflicts, unfiltered */
  conflicts: ServiceName[];
  provides: Capability[];
  /** Required capabilities no enabled service provides */
  missingRequirements: Capability[];
  /** Enabled providers of the optional capabilities */
  optionalProviders: ServiceName[];
  /** Optional capabilities no enabled service provides */
  missingOptional: Capability[];
}

/**
 * Ordering and negative constraints handed to the process supervisor.
 */
export interface SupervisorDirective {
  wants: ServiceName[];
  after: ServiceName[];
  conflicts: ServiceName[];
}
