import { describe, it, expect } from 'vitest';
import { CyclicDependencyError, fatalIssue, warningIssue } from '@svcplan/core';
import { aggregate, cycleIssue, isValidReport, summarizeReport } from '../diagnostics';

const portIssue = fatalIssue('PortOutOfRange', 'web', "Service 'web' main port 80 must be between 1024-65535 (non-privileged range)");
const domainWarning = warningIssue('DefaultDomainUnchanged', 'web', "Service 'web' is using default domain 'example.com', should be changed for production");
const missing = fatalIssue('MissingRequiredCapability', 'app', "Service 'app' requires capability 'cache' but no enabled service provides it");

describe('cycleIssue', () => {
  it('should name the cycle and its members', () => {
    expect(cycleIssue(['a', 'b'])).toEqual({
      severity: 'fatal',
      code: 'CyclicDependency',
      service: 'a',
      message: 'Circular dependency detected: a → b → a',
      related: ['a', 'b'],
    });
  });
});

describe('aggregate', () => {
  it('should pass the startup order through when nothing is fatal', () => {
    const report = aggregate({ issues: [], sort: { success: true, data: ['db', 'web'] } }, [domainWarning]);

    expect(report).toEqual({ fatal: [], warnings: [domainWarning], startupOrder: ['db', 'web'] });
    expect(isValidReport(report)).toBe(true);
  });

  it('should withhold the startup order when a validation issue is fatal', () => {
    const report = aggregate({ issues: [], sort: { success: true, data: ['web'] } }, [portIssue]);

    expect(report.startupOrder).toBeNull();
    expect(report.fatal).toEqual([portIssue]);
    expect(isValidReport(report)).toBe(false);
  });

  it('should place the cycle after graph issues and before validation issues', () => {
    const report = aggregate(
      { issues: [missing], sort: { success: false, error: new CyclicDependencyError(['a', 'b']) } },
      [portIssue, domainWarning]
    );

    expect(report.fatal.map(issue => issue.code)).toEqual([
      'MissingRequiredCapability',
      'CyclicDependency',
      'PortOutOfRange',
    ]);
    expect(report.warnings).toEqual([domainWarning]);
    expect(report.startupOrder).toBeNull();
  });

  it('should have no startup order when sorting was skipped', () => {
    expect(aggregate({ issues: [] }, []).startupOrder).toBeNull();
  });
});

describe('summarizeReport', () => {
  it('should accept a report without fatal issues', () => {
    expect(summarizeReport({ fatal: [], warnings: [domainWarning], startupOrder: ['web'] }))
      .toBe('Service configuration is valid');
  });

  it('should list every fatal issue', () => {
    expect(summarizeReport({ fatal: [missing, portIssue], warnings: [], startupOrder: null })).toBe([
      'Service configuration is invalid:',
      "  [MissingRequiredCapability] Service 'app' requires capability 'cache' but no enabled service provides it",
      "  [PortOutOfRange] Service 'web' main port 80 must be between 1024-65535 (non-privileged range)",
    ].join('\n'));
  });
});
