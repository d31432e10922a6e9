/**
 * Services Config Loader
 *
 * Parses a services config document into the engine's input shape.
 * The pure functions take file contents and environment as parameters;
 * `loadServicesConfig` is the filesystem wrapper for application code.
 */

import * as fs from 'fs';
import { ConfigurationError } from './configuration-error';
import { validateServicesConfig } from './config-validator';
import { DATABASE_KINDS } from '../service-types';
import type {
  DatabaseKind,
  DatabaseSettings,
  PrivilegedPortGrants,
  ServiceDescriptorInput,
  ServiceInstance,
  ServiceMode,
  SslSettings,
} from '../service-types';
import type { ServiceName } from '../identifiers';

/**
 * Parsed services config, ready to hand to the resolver
 */
export interface ServicesConfig {
  /** Start from the built-in catalog before applying `catalog` */
  useDefaultCatalog: boolean;
  /** Catalog entries added or overridden by this file, in file order */
  catalog: Record<ServiceName, ServiceDescriptorInput>;
  privilegedPorts: PrivilegedPortGrants;
  /** Enabled services only, in file order */
  services: ServiceInstance[];
  /** Services present in the file but not enabled */
  disabled: ServiceName[];
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function isDatabaseKind(value: unknown): value is DatabaseKind {
  return DATABASE_KINDS.some(kind => kind === value);
}

/**
 * Recursively resolve `${VAR}` placeholders in string values.
 * Unset variables are left as written.
 */
export function resolveEnvVars(value: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map(item => resolveEnvVars(item, env));
  }

  if (isObject(value)) {
    const resolved: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvVars(item, env);
    }
    return resolved;
  }

  return value;
}

function toDatabase(raw: JsonObject): DatabaseSettings {
  const kind = isDatabaseKind(raw.kind) ? raw.kind : 'sqlite3';
  const database: DatabaseSettings = {
    kind,
    host: optionalString(raw.host) ?? 'localhost',
    user: optionalString(raw.user) ?? 'app',
  };
  if (typeof raw.port === 'number') database.port = raw.port;
  const name = optionalString(raw.name);
  if (name !== undefined) database.name = name;
  const passwordFile = optionalString(raw.passwordFile);
  if (passwordFile !== undefined) database.passwordFile = passwordFile;
  if (typeof raw.tls === 'boolean') database.tls = raw.tls;
  return database;
}

function toSsl(raw: JsonObject): SslSettings {
  const ssl: SslSettings = { enabled: raw.enabled !== false };
  const certificate = optionalString(raw.certificate);
  if (certificate !== undefined) ssl.certificate = certificate;
  const certificateKey = optionalString(raw.certificateKey);
  if (certificateKey !== undefined) ssl.certificateKey = certificateKey;
  const acmeHost = optionalString(raw.acmeHost);
  if (acmeHost !== undefined) ssl.acmeHost = acmeHost;
  return ssl;
}

function toInstance(name: ServiceName, raw: JsonObject): ServiceInstance {
  const mode: ServiceMode = raw.mode === 'dev' ? 'dev' : 'prod';
  const instance: ServiceInstance = {
    name,
    port: typeof raw.port === 'number' ? raw.port : Number.NaN,
    dataDir: optionalString(raw.dataDir) ?? '',
    mode,
  };
  const domain = optionalString(raw.domain);
  if (domain !== undefined) instance.domain = domain;
  if (isObject(raw.database)) instance.database = toDatabase(raw.database);
  if (isObject(raw.ssl)) instance.ssl = toSsl(raw.ssl);
  return instance;
}

function toDescriptor(raw: JsonObject): ServiceDescriptorInput {
  return {
    provides: stringList(raw.provides),
    requires: stringList(raw.requires),
    after: stringList(raw.after),
    conflicts: stringList(raw.conflicts),
    optional: stringList(raw.optional),
  };
}

/**
 * Parse a services config document.
 *
 * @param content - File contents (JSON)
 * @param env - Variables for `${VAR}` placeholders
 * @param source - File path, for error messages
 * @throws ConfigurationError if the document is not JSON or fails the schema
 */
export function parseServicesConfig(
  content: string,
  env: Record<string, string | undefined> = {},
  source?: string
): ServicesConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      source,
      'Check the file for trailing commas or unquoted keys',
      error instanceof Error ? error : undefined
    );
  }

  const resolved = resolveEnvVars(parsed, env);
  const validation = validateServicesConfig(resolved);
  if (!validation.valid || !isObject(resolved)) {
    throw new ConfigurationError(
      `Invalid services config: ${validation.errorMessage ?? 'expected an object'}`,
      source,
      'Fix the listed properties; see services.schema.json for the expected shape'
    );
  }

  const catalog: Record<ServiceName, ServiceDescriptorInput> = {};
  if (isObject(resolved.catalog)) {
    for (const [name, raw] of Object.entries(resolved.catalog)) {
      if (isObject(raw)) catalog[name] = toDescriptor(raw);
    }
  }

  const privilegedPorts: Record<ServiceName, number[]> = {};
  if (isObject(resolved.privilegedPorts)) {
    for (const [name, ports] of Object.entries(resolved.privilegedPorts)) {
      privilegedPorts[name] = Array.isArray(ports)
        ? ports.filter((port): port is number => typeof port === 'number')
        : [];
    }
  }

  const services: ServiceInstance[] = [];
  const disabled: ServiceName[] = [];
  if (isObject(resolved.services)) {
    for (const [name, raw] of Object.entries(resolved.services)) {
      if (!isObject(raw)) continue;
      if (raw.enable === true) {
        services.push(toInstance(name, raw));
      } else {
        disabled.push(name);
      }
    }
  }

  return {
    useDefaultCatalog: resolved.useDefaultCatalog !== false,
    catalog,
    privilegedPorts,
    services,
    disabled,
  };
}

/**
 * Load a services config file from disk.
 *
 * @throws ConfigurationError if the file is missing or invalid
 */
export function loadServicesConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env
): ServicesConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(
      `Services config not found: ${filePath}`,
      filePath,
      'Pass an existing file with --config'
    );
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseServicesConfig(content, env, filePath);
}
