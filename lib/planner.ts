import { MalformedDefinitionError } from "./errors";
import { buildDependencyGraph } from "./graph/builder";
import { computeWaves, type DeploymentWave } from "./graph/layers";
import { schedule, type ScheduleOptions } from "./graph/scheduler";
import { extractDeclaredName, normalizeName } from "./parsers/definitionParser";
import type { Corpus, DefinitionSource, DependencyGraph, DeploymentPlan } from "./types";

export interface PlanResult {
  graph: DependencyGraph;
  plan: DeploymentPlan;
}

/**
 * Build a fresh graph for the corpus and order its derived objects.
 * Throws a PlanningError for the first problem found; no partial plan is returned.
 */
export function planDeployment(corpus: Corpus, options: ScheduleOptions = {}): PlanResult {
  const graph = buildDependencyGraph(corpus);
  const plan = schedule(graph, options);
  return { graph, plan };
}

export function planWaves(corpus: Corpus, options: ScheduleOptions = {}): DeploymentWave[] {
  return computeWaves(buildDependencyGraph(corpus), options);
}

/**
 * Build a corpus from name -> SQL mappings. The mapping key becomes the origin
 * and must match the name the SQL declares, ignoring case.
 */
export function corpusFromMappings(tables: Record<string, string>, derived: Record<string, string>): Corpus {
  const toSources = (mapping: Record<string, string>): DefinitionSource[] =>
    Object.entries(mapping).map(([origin, sql]) => {
      const source = { origin, sql };
      const declared = extractDeclaredName(source);
      if (declared.key !== normalizeName(origin)) {
        throw new MalformedDefinitionError(origin, `declares "${declared.name}" under the name "${origin}"`, [
          origin,
          declared.name,
        ]);
      }
      return source;
    });

  return { tables: toSources(tables), derived: toSources(derived) };
}
