// Object identifiers as written in SQL, e.g. "sales.customer_order_summary"
export type ObjectName = string;

// Node kinds: tables are owned by migrations, derived objects by the planner
export type ObjectKind = "table" | "derived";

// Construct found in a creation header
export type StatementKind = "table" | "view";

export interface DefinitionSource {
  /** Where the text came from (relative file path or caller-chosen label). */
  origin: string;
  sql: string;
}

export interface ObjectReference {
  /** Name as written between the markers. */
  name: ObjectName;
  /** Lower-cased graph key. */
  key: string;
}

export interface ParsedDefinition {
  origin: string;
  name: ObjectName;
  key: string;
  statement: StatementKind;
  references: ObjectReference[];
  sql: string;
}

export interface Corpus {
  tables: DefinitionSource[];
  derived: DefinitionSource[];
}

// Graph nodes are interned: edges refer to them by index
export interface GraphNode {
  id: number;
  key: string;
  name: ObjectName;
  kind: ObjectKind;
  /** Derived objects only. */
  definition?: ParsedDefinition;
}

export interface DependencyGraph {
  nodes: GraphNode[];
  index: Map<string, number>;
  // successors[a] holds b for every edge a -> b ("a deploys before b")
  successors: number[][];
  predecessors: number[][];
}

export type DeploymentPlan = ObjectName[];

// Graph artifact written by export-graph
export interface GraphArtifact {
  nodes: Array<{ id: string; name: ObjectName; kind: ObjectKind; origin?: string }>;
  edges: Array<{ from: string; to: string }>;
  generatedAt: string;
}
