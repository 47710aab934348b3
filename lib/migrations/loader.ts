import { readFileSync, existsSync, readdirSync } from "fs";
import { join } from "path";
import { MigrationConflictError } from "./errors";
import { sortSteps, validateSteps } from "./ledger";
import type { MigrationStep } from "./types";

// 0001_create_sales_tables.up.sql / 0001_create_sales_tables.down.sql
const MIGRATION_FILE_PATTERN = /^(\d+)_([a-z0-9_\-]+?)(?:\.(up|down))?\.sql$/i;

/**
 * Read the migration directory into steps ordered by sequence number.
 * A missing directory means there are no migrations.
 */
export function loadMigrations(dir: string): MigrationStep[] {
  if (!existsSync(dir)) return [];

  const forward = new Map<string, { sequence: number; sql: string }>();
  const reverse = new Map<string, string>();

  for (const entry of readdirSync(dir).sort()) {
    const match = MIGRATION_FILE_PATTERN.exec(entry);
    if (!match) {
      if (entry.endsWith(".sql")) {
        console.warn(`[migrations] Skipping ${entry}: expected <number>_<name>.up.sql or .down.sql`);
      }
      continue;
    }

    const sequence = parseInt(match[1], 10);
    const id = `${match[1]}_${match[2]}`;
    const sql = readFileSync(join(dir, entry), "utf-8");

    if (match[3]?.toLowerCase() === "down") {
      reverse.set(id, sql);
    } else {
      forward.set(id, { sequence, sql });
    }
  }

  for (const id of reverse.keys()) {
    if (!forward.has(id)) {
      throw new MigrationConflictError(`Reverse script ${id}.down.sql has no forward script`);
    }
  }

  const steps: MigrationStep[] = [...forward.entries()].map(([id, { sequence, sql }]) => {
    const down = reverse.get(id);
    return down === undefined ? { sequence, id, forward: sql } : { sequence, id, forward: sql, reverse: down };
  });

  validateSteps(steps);
  return sortSteps(steps);
}
