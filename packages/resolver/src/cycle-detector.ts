/**
 * Cycle Detector
 *
 * Depth-first search with an on-stack marker. Stops at the first cycle.
 */

import type { ServiceName } from '@svcplan/core';
import type { DirectedGraph } from './dependency-graph';

/**
 * Find a cycle in the graph.
 *
 * @returns The cycle from its first visited node through the node that closes
 *   it, in visitation order, or null when the graph is acyclic
 */
export function detectCycle(graph: DirectedGraph): ServiceName[] | null {
  const finished = new Set<ServiceName>();
  const onStack = new Set<ServiceName>();
  const path: ServiceName[] = [];

  const visit = (node: ServiceName): ServiceName[] | null => {
    path.push(node);
    onStack.add(node);

    for (const next of graph.successors(node)) {
      if (onStack.has(next)) {
        return path.slice(path.indexOf(next));
      }
      if (finished.has(next)) continue;
      const cycle = visit(next);
      if (cycle) return cycle;
    }

    path.pop();
    onStack.delete(node);
    finished.add(node);
    return null;
  };

  for (const node of graph.nodes) {
    if (finished.has(node)) continue;
    const cycle = visit(node);
    if (cycle) return cycle;
  }

  return null;
}
