import { describe, it, expect } from 'vitest';
import { UnknownServiceError } from '@svcplan/core';
import { ServiceCatalog } from '../catalog';
import { findProviders, resolveDependency, resolveAll } from '../capability-resolver';

const catalog = new ServiceCatalog({
  postgres: { provides: ['database.postgres'] },
  'pg-replica': { provides: ['database.postgres'] },
  redis: { provides: ['cache'] },
  app: {
    provides: ['web.service'],
    requires: ['database.postgres', 'cache'],
    after: ['postgres', 'not-enabled'],
    conflicts: ['legacy-app'],
    optional: ['monitoring.metrics'],
  },
  'self-hosted': { provides: ['queue'], requires: ['queue'] },
  dashboard: { optional: ['cache', 'monitoring.metrics'] },
});

describe('findProviders', () => {
  it('should return every enabled provider in registration order', () => {
    const enabled = new Set(['pg-replica', 'app', 'postgres']);
    expect(findProviders(catalog, 'database.postgres', enabled)).toEqual(['postgres', 'pg-replica']);
  });

  it('should ignore providers that are not enabled', () => {
    const enabled = new Set(['app', 'pg-replica']);
    expect(findProviders(catalog, 'database.postgres', enabled)).toEqual(['pg-replica']);
  });

  it('should return an empty list when nothing provides the capability', () => {
    expect(findProviders(catalog, 'cache', new Set(['app']))).toEqual([]);
  });
});

describe('resolveDependency', () => {
  it('should resolve required capabilities to enabled providers', () => {
    const resolved = resolveDependency(catalog, 'app', new Set(['app', 'postgres', 'redis']));

    expect(resolved).toEqual({
      service: 'app',
      requires: ['postgres', 'redis'],
      afterServices: ['postgres'],
      conflicts: ['legacy-app'],
      provides: ['web.service'],
      missingRequirements: [],
      optionalProviders: [],
      missingOptional: ['monitoring.metrics'],
    });
  });

  it('should record every provider when several are enabled', () => {
    const resolved = resolveDependency(catalog, 'app', new Set(['app', 'pg-replica', 'postgres', 'redis']));
    expect(resolved.requires).toEqual(['postgres', 'pg-replica', 'redis']);
  });

  it('should list required capabilities without an enabled provider', () => {
    const resolved = resolveDependency(catalog, 'app', new Set(['app']));

    expect(resolved.requires).toEqual([]);
    expect(resolved.missingRequirements).toEqual(['database.postgres', 'cache']);
    expect(resolved.afterServices).toEqual([]);
  });

  it('should let a service satisfy its own requirement without an edge', () => {
    const resolved = resolveDependency(catalog, 'self-hosted', new Set(['self-hosted']));

    expect(resolved.requires).toEqual([]);
    expect(resolved.missingRequirements).toEqual([]);
  });

  it('should resolve optional capabilities separately', () => {
    const resolved = resolveDependency(catalog, 'dashboard', new Set(['dashboard', 'redis']));

    expect(resolved.optionalProviders).toEqual(['redis']);
    expect(resolved.missingOptional).toEqual(['monitoring.metrics']);
    expect(resolved.requires).toEqual([]);
  });

  it('should throw for a service missing from the catalog', () => {
    expect(() => resolveDependency(catalog, 'ghost', new Set(['ghost']))).toThrow(UnknownServiceError);
  });
});

describe('resolveAll', () => {
  it('should resolve enabled catalog services in registration order', () => {
    const resolved = resolveAll(catalog, new Set(['redis', 'ghost', 'app', 'postgres']));
    expect(resolved.map(dep => dep.service)).toEqual(['postgres', 'redis', 'app']);
  });

  it('should be deterministic for identical input', () => {
    const enabled = new Set(['app', 'postgres', 'redis']);
    expect(JSON.stringify(resolveAll(catalog, enabled))).toBe(JSON.stringify(resolveAll(catalog, enabled)));
  });
});
