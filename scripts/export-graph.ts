/**
 * Export the dependency graph for rendering elsewhere.
 *
 * Usage:
 *   npx tsx scripts/export-graph.ts [options]
 *
 * Options:
 *   --format=dot|json   Output format (default: dot)
 *   --out=path          Output file (default: graph.dot or graph.json in the working directory)
 */

import { writeFileSync, mkdirSync } from "fs";
import { dirname, join, resolve } from "path";
import { loadConfig } from "../lib/config";
import { loadCorpus } from "../lib/corpus/loader";
import { toDot, toGraphArtifact } from "../lib/graph/export";
import { buildDependencyGraph } from "../lib/graph/builder";
import { reportFailure } from "../lib/report";

interface CliOptions {
  format: "dot" | "json";
  out: string;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const format = args.find((a) => a.startsWith("--format="))?.split("=")[1] || "dot";
  if (format !== "dot" && format !== "json") {
    throw new Error(`Unknown format "${format}" (expected dot or json)`);
  }
  const out = args.find((a) => a.startsWith("--out="))?.split("=")[1];

  return {
    format,
    out: out ? resolve(out) : join(process.cwd(), `graph.${format}`),
  };
}

function main(): void {
  const options = parseArgs();
  const config = loadConfig();
  const graph = buildDependencyGraph(loadCorpus(config.schemasPath));

  const content =
    options.format === "dot" ? toDot(graph) : JSON.stringify(toGraphArtifact(graph), null, 2) + "\n";

  mkdirSync(dirname(options.out), { recursive: true });
  writeFileSync(options.out, content);
  console.log(`✅ Wrote ${graph.nodes.length} nodes to ${options.out}`);
}

try {
  main();
} catch (error) {
  reportFailure(error);
}
