/**
 * Common error classes
 *
 * Diagnostics about a configuration are reported as values (see issues.ts);
 * these classes cover misuse of the API and unreadable input.
 */

import type { ServiceName } from './identifiers';

/**
 * Base error class for svcplan
 */
export class SvcplanError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SvcplanError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when input fails validation
 */
export class ValidationError extends SvcplanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a service name is not in the catalog
 */
export class UnknownServiceError extends SvcplanError {
  constructor(public service: ServiceName) {
    super(`Service '${service}' is not in the catalog`, 'UNKNOWN_SERVICE', { service });
    this.name = 'UnknownServiceError';
  }
}

/**
 * Hard dependencies form a cycle. `path` lists the services on the cycle in
 * traversal order, without repeating the first one.
 */
export class CyclicDependencyError extends SvcplanError {
  constructor(public path: ServiceName[]) {
    super(
      `Circular dependency detected: ${formatCyclePath(path)}`,
      'CYCLIC_DEPENDENCY',
      { path }
    );
    this.name = 'CyclicDependencyError';
  }
}

/**
 * Render a cycle as `a → b → c → a`
 */
export function formatCyclePath(path: readonly ServiceName[]): string {
  if (path.length === 0) return '';
  return [...path, path[0]].join(' → ');
}
