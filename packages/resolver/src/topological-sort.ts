/**
 * Topological Sorter
 *
 * Kahn's algorithm over hard edges. Among ready services, one whose soft
 * predecessors have all been placed goes first; ties fall back to node order.
 */

import { CyclicDependencyError, type ServiceName } from '@svcplan/core';
import { detectCycle } from './cycle-detector';
import type { DependencyGraph } from './dependency-graph';

export type SortResult =
  | { success: true; data: ServiceName[] }
  | { success: false; error: CyclicDependencyError };

export function topologicalSort(graph: DependencyGraph): SortResult {
  const inDegree = new Map<ServiceName, number>();
  for (const node of graph.nodes) inDegree.set(node, 0);
  for (const node of graph.nodes) {
    for (const next of graph.successors(node)) {
      inDegree.set(next, (inDegree.get(next) ?? 0) + 1);
    }
  }

  const ready: ServiceName[] = graph.nodes.filter(node => inDegree.get(node) === 0);
  const placed = new Set<ServiceName>();
  const order: ServiceName[] = [];

  const softSatisfied = (node: ServiceName): boolean =>
    graph.softPredecessors(node).every(predecessor => placed.has(predecessor));

  while (ready.length > 0) {
    // `ready` is kept in node order, so the first match is the lowest rank
    const preferred = ready.findIndex(softSatisfied);
    const [current] = ready.splice(preferred === -1 ? 0 : preferred, 1);
    if (current === undefined) break;

    order.push(current);
    placed.add(current);

    for (const next of graph.successors(current)) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) {
        const at = ready.findIndex(candidate => graph.rank(candidate) > graph.rank(next));
        ready.splice(at === -1 ? ready.length : at, 0, next);
      }
    }
  }

  if (order.length < graph.nodes.length) {
    const unplaced = new Set(graph.nodes.filter(node => !placed.has(node)));
    // Every unplaced node has an unplaced hard predecessor, so a cycle exists
    const cycle = detectCycle(graph.subgraph(unplaced)) ?? [...unplaced];
    return { success: false, error: new CyclicDependencyError(cycle) };
  }

  return { success: true, data: order };
}
