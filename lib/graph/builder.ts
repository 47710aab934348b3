import { DanglingReferenceError } from "../errors";
import { normalizeName, parseDefinition, parseTableDefinition } from "../parsers/definitionParser";
import type { Corpus, DependencyGraph, GraphNode, ObjectKind, ParsedDefinition } from "../types";
import { classify, createRegistry, type ObjectRegistry } from "./classifier";

/**
 * Build the dependency graph of a corpus.
 *
 * Derived objects become nodes in the order they are declared, then any table
 * they touch is interned on first reference. Edges run from the referenced
 * object to the object that references it.
 */
export function buildDependencyGraph(corpus: Corpus): DependencyGraph {
  const tables = corpus.tables.map(parseTableDefinition);
  const derived = corpus.derived.map(parseDefinition);
  const registry = createRegistry(tables, derived);

  return assembleGraph(registry, derived);
}

export function assembleGraph(registry: ObjectRegistry, derived: ParsedDefinition[]): DependencyGraph {
  const graph: DependencyGraph = {
    nodes: [],
    index: new Map(),
    successors: [],
    predecessors: [],
  };

  for (const definition of derived) {
    intern(graph, definition.key, definition.name, "derived", definition);
  }

  for (const definition of derived) {
    const to = internedId(graph, definition.key);

    for (const ref of definition.references) {
      const kind = classify(registry, ref.key);
      const declared = kind === "table" ? registry.tables.get(ref.key) : registry.derived.get(ref.key);
      if (!declared) {
        throw new DanglingReferenceError(ref.name, definition.name);
      }

      const from = intern(graph, ref.key, declared.name, kind, kind === "derived" ? declared : undefined);
      addEdge(graph, from, to);
    }
  }

  return graph;
}

function intern(
  graph: DependencyGraph,
  key: string,
  name: string,
  kind: ObjectKind,
  definition?: ParsedDefinition
): number {
  const existing = graph.index.get(key);
  if (existing !== undefined) return existing;

  const node: GraphNode = { id: graph.nodes.length, key, name, kind };
  if (definition) node.definition = definition;

  graph.nodes.push(node);
  graph.index.set(key, node.id);
  graph.successors.push([]);
  graph.predecessors.push([]);
  return node.id;
}

function internedId(graph: DependencyGraph, key: string): number {
  const id = graph.index.get(key);
  if (id === undefined) {
    throw new Error(`Object "${key}" was not interned`);
  }
  return id;
}

function addEdge(graph: DependencyGraph, from: number, to: number): void {
  if (graph.successors[from].includes(to)) return;
  graph.successors[from].push(to);
  graph.predecessors[to].push(from);
}

/**
 * Look up a node by name, ignoring case.
 */
export function findNode(graph: DependencyGraph, name: string): GraphNode | undefined {
  const id = graph.index.get(normalizeName(name));
  return id === undefined ? undefined : graph.nodes[id];
}

/**
 * Edges as name pairs, in node order.
 */
export function listEdges(graph: DependencyGraph): Array<[string, string]> {
  const edges: Array<[string, string]> = [];
  for (const node of graph.nodes) {
    for (const to of graph.successors[node.id]) {
      edges.push([node.name, graph.nodes[to].name]);
    }
  }
  return edges;
}
