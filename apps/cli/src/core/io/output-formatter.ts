/**
 * Output Formatter - summary and JSON renderings of engine results
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { Report, ServiceName, SupervisorDirective, ValidationIssue } from '@svcplan/core';
import type { ExpansionResult } from '@svcplan/resolver';
import type { OUTPUT_FORMATS } from '../../lib/base-options-schema';

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  /** Whether to include color codes */
  colors: boolean;
}

const plain = new Chalk({ level: 0 });

function palette(options: OutputOptions): ChalkInstance {
  return options.colors ? chalk : plain;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(' ') : '-';
}

function formatIssue(issue: ValidationIssue, marker: string, options: OutputOptions): string {
  const related = options.verbose && issue.related && issue.related.length > 0
    ? ` (related: ${issue.related.join(', ')})`
    : '';
  return `  ${marker} [${issue.code}] ${issue.message}${related}`;
}

/**
 * Render a validation report
 */
export function formatReport(report: Report, options: OutputOptions): string {
  if (options.format === 'json') {
    return JSON.stringify(report, null, 2);
  }

  const c = palette(options);
  const lines: string[] = [];

  if (report.fatal.length === 0) {
    if (!options.quiet) lines.push(c.green('✅ Service configuration is valid'));
  } else {
    lines.push(c.red(`❌ Service configuration is invalid: ${plural(report.fatal.length, 'fatal issue')}`));
    for (const issue of report.fatal) {
      lines.push(formatIssue(issue, c.red('✗'), options));
    }
  }

  if (!options.quiet && report.warnings.length > 0) {
    lines.push(c.yellow(`⚠️  ${plural(report.warnings.length, 'warning')}`));
    for (const issue of report.warnings) {
      lines.push(formatIssue(issue, c.yellow('!'), options));
    }
  }

  if (!options.quiet && report.startupOrder) {
    lines.push(`${c.bold('Startup order:')} ${report.startupOrder.join(' → ')}`);
  }

  return lines.join('\n');
}

/**
 * One service per line, or a JSON array
 */
export function formatStartupOrder(order: readonly ServiceName[], options: OutputOptions): string {
  return options.format === 'json' ? JSON.stringify(order) : order.join('\n');
}

export function formatDirectives(
  directives: Record<ServiceName, SupervisorDirective>,
  options: OutputOptions
): string {
  if (options.format === 'json') {
    return JSON.stringify(directives, null, 2);
  }

  const c = palette(options);
  const blocks = Object.entries(directives).map(([name, directive]) => [
    c.bold(name),
    `  wants:     ${formatList(directive.wants)}`,
    `  after:     ${formatList(directive.after)}`,
    `  conflicts: ${formatList(directive.conflicts)}`,
  ].join('\n'));
  return blocks.join('\n');
}

export function formatExpansion(result: ExpansionResult, options: OutputOptions): string {
  if (options.format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  const c = palette(options);
  const lines = [
    `${c.bold('Services:')} ${formatList(result.services)}`,
    `${c.bold('Added:')} ${formatList(result.added)}`,
  ];
  for (const { service, capability } of result.unresolved) {
    lines.push(c.yellow(`  ! '${service}' requires '${capability}' but no provider can be added`));
  }
  return lines.join('\n');
}
