import type { ScheduleOptions } from "../graph/scheduler";
import { findNode } from "../graph/builder";
import type { MigrationLedger, MigrationStep } from "../migrations/types";
import { quoteName, renderDefinition } from "../parsers/definitionParser";
import { planDeployment } from "../planner";
import type { Corpus, DependencyGraph, DeploymentPlan, ParsedDefinition } from "../types";

/** Anything that can run a SQL script, such as a better-sqlite3 Database. */
export interface DeployTarget {
  exec(sql: string): unknown;
}

export interface DeployOptions extends ScheduleOptions {
  corpus: Corpus;
  migrations: MigrationStep[];
  ledger: MigrationLedger;
  target: DeployTarget;
  dryRun?: boolean;
}

export interface DeployResult {
  plan: DeploymentPlan;
  pendingMigrations: string[];
  appliedMigrations: string[];
  deployed: string[];
  dryRun: boolean;
}

/**
 * Plan, migrate, then recreate derived objects: planned objects are dropped in
 * reverse plan order and created again in plan order.
 *
 * Planning runs first so that a broken corpus stops the deploy before any
 * migration or definition touches the target.
 */
export function deploy(options: DeployOptions): DeployResult {
  const { graph, plan } = planDeployment(options.corpus, { only: options.only });
  const pending = options.ledger.pending(options.migrations).map((step) => step.id);

  const result: DeployResult = {
    plan,
    pendingMigrations: pending,
    appliedMigrations: [],
    deployed: [],
    dryRun: options.dryRun ?? false,
  };

  if (result.dryRun) {
    console.log(`[deploy] Dry run: ${pending.length} migration(s) pending, ${plan.length} object(s) planned`);
    return result;
  }

  result.appliedMigrations = options.ledger.applyAll(options.migrations).applied;

  const definitions = plan.map((name) => definitionOf(graph, name));

  // Reverse plan order: dependents before their dependencies
  for (const definition of [...definitions].reverse()) {
    const kind = definition.statement === "table" ? "TABLE" : "VIEW";
    try {
      options.target.exec(`DROP ${kind} IF EXISTS ${quoteName(definition.name)};`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to drop ${definition.name}: ${message}`, { cause: error });
    }
  }

  for (const definition of definitions) {
    console.log(`[deploy] Creating ${definition.name} (${definition.origin})`);
    try {
      options.target.exec(renderDefinition(definition.sql));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to create ${definition.name} from ${definition.origin}: ${message}`, { cause: error });
    }
    result.deployed.push(definition.name);
  }

  console.log(`[deploy] Created ${result.deployed.length} object(s)`);
  return result;
}

function definitionOf(graph: DependencyGraph, name: string): ParsedDefinition {
  const definition = findNode(graph, name)?.definition;
  if (!definition) {
    throw new Error(`No definition loaded for planned object "${name}"`);
  }
  return definition;
}
