/**
 * Names used across the service graph.
 *
 * Both are plain strings compared by exact match. They are kept as distinct
 * aliases so signatures say which of the two they expect.
 */

/** A catalog entry, e.g. `postgres` or `matrix-synapse` */
export type ServiceName = string;

/** A functional role a service provides or needs, e.g. `database.postgres` */
export type Capability = string;

const SERVICE_NAME_PATTERN = /^[a-z][a-z0-9._-]*$/;

export function isServiceName(value: string): value is ServiceName {
  return SERVICE_NAME_PATTERN.test(value);
}

/**
 * Remove duplicates while keeping the first occurrence of each value.
 */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  const seen = new Set<T>();
  const result: T[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}
