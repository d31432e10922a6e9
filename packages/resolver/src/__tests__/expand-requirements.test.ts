import { describe, it, expect } from 'vitest';
import { UnknownServiceError } from '@svcplan/core';
import { ServiceCatalog, createDefaultCatalog } from '../catalog';
import { expandRequirements } from '../expand-requirements';

describe('expandRequirements', () => {
  const defaults = createDefaultCatalog();

  it('should add providers for unmet requirements', () => {
    expect(expandRequirements(defaults, ['mastodon'])).toEqual({
      services: ['postgres', 'redis', 'mastodon'],
      added: ['postgres', 'redis'],
      unresolved: [],
    });
  });

  it('should add nothing when requirements are already met', () => {
    const result = expandRequirements(defaults, ['gitea', 'postgres']);
    expect(result.added).toEqual([]);
    expect(result.services).toEqual(['postgres', 'gitea']);
  });

  it('should follow requirements of added services', () => {
    const catalog = new ServiceCatalog({
      db: { provides: ['cap.db'] },
      api: { provides: ['cap.api'], requires: ['cap.db'] },
      app: { requires: ['cap.api'] },
    });

    expect(expandRequirements(catalog, ['app'])).toEqual({
      services: ['db', 'api', 'app'],
      added: ['api', 'db'],
      unresolved: [],
    });
  });

  it('should skip a provider that conflicts with a chosen service', () => {
    const catalog = new ServiceCatalog({
      'proxy-a': { provides: ['proxy'], conflicts: ['legacy'] },
      'proxy-b': { provides: ['proxy'] },
      legacy: {},
      site: { requires: ['proxy'] },
    });

    expect(expandRequirements(catalog, ['site', 'legacy']).added).toEqual(['proxy-b']);
  });

  it('should skip a provider a chosen service conflicts with', () => {
    const catalog = new ServiceCatalog({
      'proxy-a': { provides: ['proxy'] },
      'proxy-b': { provides: ['proxy'] },
      legacy: { conflicts: ['proxy-a'] },
      site: { requires: ['proxy'] },
    });

    expect(expandRequirements(catalog, ['site', 'legacy']).added).toEqual(['proxy-b']);
  });

  it('should report requirements no provider can satisfy', () => {
    const catalog = new ServiceCatalog({
      site: { requires: ['cap.none'] },
    });

    expect(expandRequirements(catalog, ['site'])).toEqual({
      services: ['site'],
      added: [],
      unresolved: [{ service: 'site', capability: 'cap.none' }],
    });
  });

  it('should reject services missing from the catalog', () => {
    expect(() => expandRequirements(defaults, ['ghost'])).toThrow(UnknownServiceError);
  });
});
