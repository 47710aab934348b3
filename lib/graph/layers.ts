/**
 * Group a deployment plan into waves.
 *
 * Wave 0 holds derived objects that only depend on tables. Each other object
 * sits one wave after its deepest derived dependency, so objects sharing a
 * wave never depend on each other and could be created side by side.
 */

import type { DependencyGraph, ObjectName } from "../types";
import { findNode } from "./builder";
import { schedule, type ScheduleOptions } from "./scheduler";

export interface DeploymentWave {
  wave: number;
  objects: ObjectName[];
}

export function computeWaves(graph: DependencyGraph, options: ScheduleOptions = {}): DeploymentWave[] {
  // Plan order guarantees every dependency is layered before its dependents
  const plan = schedule(graph, options);
  const layers = new Map<number, number>();

  for (const name of plan) {
    const node = findNode(graph, name);
    if (!node) continue;

    let layer = 0;
    for (const from of graph.predecessors[node.id]) {
      const upstream = layers.get(from);
      if (upstream !== undefined && upstream + 1 > layer) {
        layer = upstream + 1;
      }
    }
    layers.set(node.id, layer);
  }

  const waves: DeploymentWave[] = [];
  for (const name of plan) {
    const node = findNode(graph, name);
    if (!node) continue;
    const layer = layers.get(node.id) ?? 0;
    while (waves.length <= layer) {
      waves.push({ wave: waves.length, objects: [] });
    }
    waves[layer].objects.push(name);
  }

  return waves;
}
