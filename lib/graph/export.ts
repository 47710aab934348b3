import type { DependencyGraph, GraphArtifact, ObjectKind } from "../types";

const COLOR_MAP: Record<ObjectKind, string> = {
  table: "blue",
  derived: "red",
};

/**
 * Serializable snapshot of the graph, keyed by lower-cased names.
 */
export function toGraphArtifact(graph: DependencyGraph, generatedAt: Date = new Date()): GraphArtifact {
  return {
    nodes: graph.nodes.map((node) => ({
      id: node.key,
      name: node.name,
      kind: node.kind,
      ...(node.definition ? { origin: node.definition.origin } : {}),
    })),
    edges: graph.nodes.flatMap((node) =>
      graph.successors[node.id].map((to) => ({ from: node.key, to: graph.nodes[to].key }))
    ),
    generatedAt: generatedAt.toISOString(),
  };
}

/**
 * Graphviz DOT document. Names are quoted since they contain dots.
 */
export function toDot(graph: DependencyGraph): string {
  const lines = ["digraph dependencies {", "  rankdir=LR;"];

  for (const node of graph.nodes) {
    lines.push(`  "${node.name}" [kind=${node.kind}, color=${COLOR_MAP[node.kind]}];`);
  }
  for (const node of graph.nodes) {
    for (const to of graph.successors[node.id]) {
      lines.push(`  "${node.name}" -> "${graph.nodes[to].name}";`);
    }
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}
