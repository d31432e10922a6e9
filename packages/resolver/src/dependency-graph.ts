/**
 * Dependency Graph Builder
 *
 * Directed graph over enabled services. Hard edges run provider → dependent
 * and decide feasibility; soft edges run `after` target → declaring service
 * and only break ties when sorting.
 */

import type { DependencyEdge, ResolvedDependency, ServiceName } from '@svcplan/core';
import type { ServiceCatalog } from './catalog';

/**
 * Minimal view of a directed graph, enough for cycle detection
 */
export interface DirectedGraph {
  readonly nodes: readonly ServiceName[];
  successors(node: ServiceName): readonly ServiceName[];
}

export class DependencyGraph implements DirectedGraph {
  readonly nodes: readonly ServiceName[];
  private readonly hard = new Map<ServiceName, ServiceName[]>();
  private readonly soft = new Map<ServiceName, ServiceName[]>();
  private readonly softIncoming = new Map<ServiceName, ServiceName[]>();
  private readonly ranks = new Map<ServiceName, number>();

  constructor(nodes: readonly ServiceName[], edges: readonly DependencyEdge[]) {
    this.nodes = Object.freeze([...nodes]);
    nodes.forEach((node, index) => {
      this.ranks.set(node, index);
      this.hard.set(node, []);
      this.soft.set(node, []);
      this.softIncoming.set(node, []);
    });

    for (const edge of edges) {
      if (!this.ranks.has(edge.from) || !this.ranks.has(edge.to)) continue;
      const adjacency = edge.kind === 'hard' ? this.hard : this.soft;
      const targets = adjacency.get(edge.from) ?? [];
      if (!targets.includes(edge.to)) {
        targets.push(edge.to);
        adjacency.set(edge.from, targets);
        if (edge.kind === 'soft') {
          this.softIncoming.get(edge.to)?.push(edge.from);
        }
      }
    }

    // Keep adjacency in node order so traversals are reproducible
    for (const adjacency of [this.hard, this.soft, this.softIncoming]) {
      for (const targets of adjacency.values()) {
        targets.sort((a, b) => this.rank(a) - this.rank(b));
      }
    }
  }

  /** Position in `nodes` */
  rank(node: ServiceName): number {
    return this.ranks.get(node) ?? Number.MAX_SAFE_INTEGER;
  }

  /** Hard successors: services that need `node` started first */
  successors(node: ServiceName): readonly ServiceName[] {
    return this.hard.get(node) ?? [];
  }

  /** Services that prefer to start after `node` */
  softSuccessors(node: ServiceName): readonly ServiceName[] {
    return this.soft.get(node) ?? [];
  }

  /** Services `node` prefers to start after */
  softPredecessors(node: ServiceName): readonly ServiceName[] {
    return this.softIncoming.get(node) ?? [];
  }

  edges(): DependencyEdge[] {
    const edges: DependencyEdge[] = [];
    for (const from of this.nodes) {
      for (const to of this.successors(from)) edges.push({ from, to, kind: 'hard' });
      for (const to of this.softSuccessors(from)) edges.push({ from, to, kind: 'soft' });
    }
    return edges;
  }

  /**
   * Graph restricted to `keep`, preserving node order and edges between kept nodes
   */
  subgraph(keep: ReadonlySet<ServiceName>): DependencyGraph {
    return new DependencyGraph(
      this.nodes.filter(node => keep.has(node)),
      this.edges().filter(edge => keep.has(edge.from) && keep.has(edge.to))
    );
  }
}

/**
 * Build the graph from resolved dependencies. Nodes follow registration order.
 */
export function buildDependencyGraph(
  catalog: ServiceCatalog,
  resolved: readonly ResolvedDependency[]
): DependencyGraph {
  const nodes = catalog.sortByRank(resolved.map(dep => dep.service));
  const edges: DependencyEdge[] = [];

  for (const dep of resolved) {
    for (const provider of dep.requires) {
      edges.push({ from: provider, to: dep.service, kind: 'hard' });
    }
    for (const predecessor of dep.afterServices) {
      edges.push({ from: predecessor, to: dep.service, kind: 'soft' });
    }
  }

  return new DependencyGraph(nodes, edges);
}
