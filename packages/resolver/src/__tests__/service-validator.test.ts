import { describe, it, expect } from 'vitest';
import { validateServices, isValidDomain } from '../service-validator';
import { createTestInstance } from './helpers/test-data';

describe('isValidDomain', () => {
  it('should accept dotted names with an alphabetic top-level label', () => {
    expect(isValidDomain('git.example.org')).toBe(true);
    expect(isValidDomain('my-host.lan')).toBe(true);
  });

  it('should reject names without a top-level label', () => {
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('host.1')).toBe(false);
    expect(isValidDomain('bad domain.com')).toBe(false);
  });
});

describe('validateServices', () => {
  it('should return no issues for valid instances', () => {
    expect(validateServices([createTestInstance('a', 8080), createTestInstance('b', 8081)])).toEqual([]);
  });

  describe('port range', () => {
    it('should reject privileged ports', () => {
      expect(validateServices([createTestInstance('web', 80)])).toEqual([{
        severity: 'fatal',
        code: 'PortOutOfRange',
        service: 'web',
        message: "Service 'web' main port 80 must be between 1024-65535 (non-privileged range)",
      }]);
    });

    it('should only read grants the config declares for the service itself', () => {
      const issues = validateServices([createTestInstance('constructor', 80)], { privilegedPorts: {} });
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'PortOutOfRange',
        service: 'constructor',
        message: "Service 'constructor' main port 80 must be between 1024-65535 (non-privileged range)",
      }]);
    });

    it('should accept a privileged port granted to the service', () => {
      const issues = validateServices([createTestInstance('web', 80)], { privilegedPorts: { web: [80, 443] } });
      expect(issues).toEqual([]);
    });

    it('should not apply a grant to another service', () => {
      const issues = validateServices([createTestInstance('web', 80)], { privilegedPorts: { proxy: [80] } });
      expect(issues.map(issue => issue.code)).toEqual(['PortOutOfRange']);
    });

    it('should reject ports above 65535', () => {
      const issues = validateServices([createTestInstance('web', 70000)]);
      expect(issues[0]?.message).toBe("Service 'web' main port 70000 must be between 1024-65535 (non-privileged range)");
    });

    it('should accept the range boundaries', () => {
      expect(validateServices([createTestInstance('a', 1024), createTestInstance('b', 65535)])).toEqual([]);
    });
  });

  it('should reject a relative data directory', () => {
    expect(validateServices([createTestInstance('web', 8080, { dataDir: 'data/web' })])).toEqual([{
      severity: 'fatal',
      code: 'RelativeDataDir',
      service: 'web',
      message: "Service 'web' dataDir path 'data/web' should be absolute and valid",
    }]);
  });

  it('should reject a malformed domain', () => {
    const issues = validateServices([createTestInstance('web', 8080, { domain: 'not a domain' })]);
    expect(issues).toEqual([{
      severity: 'fatal',
      code: 'InvalidDomainFormat',
      service: 'web',
      message: "Service 'web' domain 'not a domain' is not a valid domain name format",
    }]);
  });

  describe('database', () => {
    it('should require a password file for password databases', () => {
      const issues = validateServices([
        createTestInstance('app', 8080, { database: { kind: 'postgres', host: 'localhost', user: 'app' } }),
      ]);
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'MissingDatabaseCredential',
        service: 'app',
        message: "Service 'app' database type 'postgres' requires passwordFile to be set",
      }]);
    });

    it('should not require a password file for sqlite3', () => {
      const issues = validateServices([
        createTestInstance('app', 8080, { database: { kind: 'sqlite3', host: 'localhost', user: 'app' } }),
      ]);
      expect(issues).toEqual([]);
    });

    it('should warn about an unencrypted remote connection', () => {
      const issues = validateServices([
        createTestInstance('app', 8080, {
          database: { kind: 'mysql', host: 'db.internal.net', user: 'app', passwordFile: '/run/secrets/db' },
        }),
      ]);
      expect(issues).toEqual([{
        severity: 'warning',
        code: 'UnencryptedDatabaseLink',
        service: 'app',
        message: "Service 'app' database connection to 'db.internal.net' should use encryption",
      }]);
    });

    it('should accept a remote connection with tls', () => {
      const issues = validateServices([
        createTestInstance('app', 8080, {
          database: { kind: 'mysql', host: 'db.internal.net', user: 'app', passwordFile: '/run/secrets/db', tls: true },
        }),
      ]);
      expect(issues).toEqual([]);
    });

    it('should treat socket paths as local', () => {
      const issues = validateServices([
        createTestInstance('app', 8080, {
          database: { kind: 'postgres', host: '/run/postgresql', user: 'app', passwordFile: '/run/secrets/db' },
        }),
      ]);
      expect(issues).toEqual([]);
    });
  });

  describe('ssl', () => {
    it('should require certificate paths without ACME', () => {
      const issues = validateServices([
        createTestInstance('web', 8080, { ssl: { enabled: true, certificate: '/etc/ssl/web.pem' } }),
      ]);
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'InconsistentSslConfig',
        service: 'web',
        message: "Service 'web' SSL enabled without ACME requires both certificate and certificateKey paths",
      }]);
    });

    it('should accept ACME without certificate paths', () => {
      const issues = validateServices([
        createTestInstance('web', 8080, { ssl: { enabled: true, acmeHost: 'web.acme.org' } }),
      ]);
      expect(issues).toEqual([]);
    });

    it('should accept a certificate and key', () => {
      const issues = validateServices([
        createTestInstance('web', 8080, {
          ssl: { enabled: true, certificate: '/etc/ssl/web.pem', certificateKey: '/etc/ssl/web.key' },
        }),
      ]);
      expect(issues).toEqual([]);
    });

    it('should warn when ssl is disabled in production', () => {
      const issues = validateServices([createTestInstance('web', 8080, { ssl: { enabled: false } })]);
      expect(issues).toEqual([{
        severity: 'warning',
        code: 'SslDisabledInProd',
        service: 'web',
        message: "Service 'web' has SSL disabled in production mode - security risk",
      }]);
    });

    it('should not warn when ssl is disabled in dev mode', () => {
      const issues = validateServices([createTestInstance('web', 8080, { mode: 'dev', ssl: { enabled: false } })]);
      expect(issues).toEqual([]);
    });
  });

  describe('domains', () => {
    it('should warn about a production-looking domain in dev mode', () => {
      const issues = validateServices([createTestInstance('web', 8080, { mode: 'dev', domain: 'git.mycompany.com' })]);
      expect(issues).toEqual([{
        severity: 'warning',
        code: 'DevModeWithProdLikeDomain',
        service: 'web',
        message: "Service 'web' is in dev mode but domain 'git.mycompany.com' looks like production",
      }]);
    });

    it('should accept a local domain in dev mode', () => {
      expect(validateServices([createTestInstance('web', 8080, { mode: 'dev', domain: 'web.test' })])).toEqual([]);
    });

    it('should warn about an unchanged default domain', () => {
      const issues = validateServices([createTestInstance('web', 8080, { domain: 'git.example.com' })]);
      expect(issues).toEqual([{
        severity: 'warning',
        code: 'DefaultDomainUnchanged',
        service: 'web',
        message: "Service 'web' is using default domain 'git.example.com', should be changed for production",
      }]);
    });

    it('should not treat lookalike domains as the default', () => {
      expect(validateServices([createTestInstance('web', 8080, { domain: 'myexample.com' })])).toEqual([]);
    });
  });

  it('should report every failing rule of an instance', () => {
    const issues = validateServices([createTestInstance('web', 80, { dataDir: 'web', domain: 'bad' })]);
    expect(issues.map(issue => issue.code)).toEqual(['PortOutOfRange', 'RelativeDataDir', 'InvalidDomainFormat']);
  });

  describe('collisions', () => {
    it('should attribute a port collision to the later service', () => {
      const issues = validateServices([createTestInstance('a', 8080), createTestInstance('b', 8080)]);
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'PortCollision',
        service: 'b',
        message: "Port 8080 is already used by service 'a', cannot assign to 'b'",
        related: ['a'],
      }]);
    });

    it('should report every colliding pair', () => {
      const issues = validateServices([
        createTestInstance('a', 8080),
        createTestInstance('b', 8080),
        createTestInstance('c', 8080),
      ]);
      expect(issues.map(issue => [issue.service, issue.related])).toEqual([
        ['b', ['a']],
        ['c', ['a']],
        ['c', ['b']],
      ]);
    });

    it('should compare normalized data directories', () => {
      const issues = validateServices([
        createTestInstance('a', 8080, { dataDir: '/srv/data/' }),
        createTestInstance('b', 8081, { dataDir: '/srv/./data' }),
      ]);
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'DataDirCollision',
        service: 'b',
        message: "Data directory '/srv/data' is already used by service 'a', cannot assign to 'b'",
        related: ['a'],
      }]);
    });

    it('should report duplicates instead of self-collisions', () => {
      const issues = validateServices([createTestInstance('a', 8080), createTestInstance('a', 8080)]);
      expect(issues).toEqual([{
        severity: 'fatal',
        code: 'DuplicateService',
        service: 'a',
        message: "Service 'a' is enabled 2 times",
      }]);
    });

    it('should list port collisions before data directory collisions', () => {
      const issues = validateServices([
        createTestInstance('a', 8080, { dataDir: '/srv/shared' }),
        createTestInstance('b', 8080, { dataDir: '/srv/shared' }),
      ]);
      expect(issues.map(issue => issue.code)).toEqual(['PortCollision', 'DataDirCollision']);
    });
  });
});
