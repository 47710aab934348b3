import { CyclicDependencyError, DanglingReferenceError } from "../errors";
import type { DependencyGraph, DeploymentPlan, GraphNode } from "../types";
import { findNode } from "./builder";

export interface ScheduleOptions {
  /**
   * Restrict the plan to these objects and every derived object downstream of them.
   * Tables are allowed: selecting one plans everything built on top of it.
   */
  only?: string[];
}

/**
 * Linearize the derived objects of a graph so every object comes after the
 * objects it depends on. Tables are treated as already deployed and never
 * appear in the plan. Whenever several objects are ready, the one with the
 * smallest key goes next.
 */
export function schedule(graph: DependencyGraph, options: ScheduleOptions = {}): DeploymentPlan {
  const ordered = linearize(graph);

  if (!options.only) {
    return ordered.map((node) => node.name);
  }

  const selected = downstreamOf(graph, options.only);
  return ordered.filter((node) => selected.has(node.id)).map((node) => node.name);
}

function linearize(graph: DependencyGraph): GraphNode[] {
  const derived = graph.nodes.filter((node) => node.kind === "derived");

  // Unresolved derived dependencies per node; table edges are satisfied up front
  const pending = new Map<number, number>();
  for (const node of derived) {
    const count = graph.predecessors[node.id].filter((from) => graph.nodes[from].kind === "derived").length;
    pending.set(node.id, count);
  }

  const ready = derived.filter((node) => pending.get(node.id) === 0).sort(byKey);
  const ordered: GraphNode[] = [];

  // Always emit the smallest ready key; released objects compete with those already waiting
  while (ready.length > 0) {
    const node = ready.shift();
    if (!node) break;
    ordered.push(node);

    for (const to of graph.successors[node.id]) {
      const remaining = (pending.get(to) ?? 0) - 1;
      pending.set(to, remaining);
      if (remaining === 0) insertSorted(ready, graph.nodes[to]);
    }
  }

  if (ordered.length < derived.length) {
    const done = new Set(ordered.map((node) => node.id));
    const stuck = derived.filter((node) => !done.has(node.id));
    throw new CyclicDependencyError(findCycle(graph, stuck).map((node) => node.name));
  }

  return ordered;
}

function byKey(a: GraphNode, b: GraphNode): number {
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function insertSorted(ready: GraphNode[], node: GraphNode): void {
  let lo = 0;
  let hi = ready.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (byKey(ready[mid], node) < 0) lo = mid + 1;
    else hi = mid;
  }
  ready.splice(lo, 0, node);
}

/**
 * Find a cycle among nodes the scheduler could not place.
 *
 * Every stuck node still has a stuck predecessor, so walking predecessors from
 * the smallest key must revisit a node. The walk is reversed to report the
 * cycle in deployment direction, starting from its smallest key.
 */
export function findCycle(graph: DependencyGraph, stuck: GraphNode[]): GraphNode[] {
  if (stuck.length === 0) return [];

  const remaining = new Set(stuck.map((node) => node.id));
  const start = [...stuck].sort(byKey)[0];

  const path: number[] = [];
  const position = new Map<number, number>();
  let current = start.id;

  while (!position.has(current)) {
    position.set(current, path.length);
    path.push(current);

    const next = graph.predecessors[current]
      .filter((from) => remaining.has(from))
      .map((from) => graph.nodes[from])
      .sort(byKey)[0];
    if (!next) {
      // Not reachable for nodes left over by the scheduler
      throw new Error(`"${graph.nodes[current].name}" has no unresolved dependency`);
    }
    current = next.id;
  }

  const loop = path.slice(position.get(current)).reverse();
  const smallest = loop.reduce((best, id, i) => (graph.nodes[id].key < graph.nodes[loop[best]].key ? i : best), 0);
  return [...loop.slice(smallest), ...loop.slice(0, smallest)].map((id) => graph.nodes[id]);
}

/**
 * Ids of the given objects plus every derived object that transitively depends on them.
 */
export function downstreamOf(graph: DependencyGraph, names: string[]): Set<number> {
  const seen = new Set<number>();
  const queue: number[] = [];

  for (const name of names) {
    const node = findNode(graph, name);
    if (!node) {
      throw new DanglingReferenceError(name);
    }
    if (!seen.has(node.id)) {
      seen.add(node.id);
      queue.push(node.id);
    }
  }

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const to of graph.successors[id]) {
      if (!seen.has(to)) {
        seen.add(to);
        queue.push(to);
      }
    }
  }

  return seen;
}
