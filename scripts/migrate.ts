/**
 * Drive the migration ledger.
 *
 * Usage:
 *   npx tsx scripts/migrate.ts <command>
 *
 * Commands:
 *   up       Apply every pending migration in sequence order
 *   down     Revert the most recently applied migration
 *   status   List applied and pending migrations
 *   unlock   Release a lock left behind by a crashed run
 *
 * Environment variables:
 *   DEPLOY_CONFIG    Path to deploy.yml (default: ./deploy.yml)
 *   DATABASE_PATH    SQLite database (overrides deploy.yml)
 *   MIGRATIONS_PATH  Migration directory (overrides deploy.yml)
 */

import { loadConfig } from "../lib/config";
import { openDatabase } from "../lib/db";
import { SqliteMigrationLedger } from "../lib/migrations/ledger";
import { loadMigrations } from "../lib/migrations/loader";
import { reportFailure } from "../lib/report";

type Command = "up" | "down" | "status" | "unlock";

function parseCommand(): Command {
  const command = process.argv[2] ?? "status";
  if (command === "up" || command === "down" || command === "status" || command === "unlock") {
    return command;
  }
  throw new Error(`Unknown command "${command}" (expected up, down, status or unlock)`);
}

function main(): void {
  const command = parseCommand();
  const config = loadConfig();
  const db = openDatabase(config.databasePath, { attach: config.attach });

  try {
    const ledger = new SqliteMigrationLedger(db);

    switch (command) {
      case "up": {
        const result = ledger.applyAll(loadMigrations(config.migrationsPath));
        console.log(`✅ Applied ${result.applied.length}, skipped ${result.skipped.length}`);
        break;
      }
      case "down": {
        const reverted = ledger.revertLast();
        console.log(reverted === undefined ? "⏭️  Nothing to revert" : `✅ Reverted migration ${reverted}`);
        break;
      }
      case "status": {
        const applied = ledger.listApplied();
        const pending = ledger.pending(loadMigrations(config.migrationsPath));
        console.log("Applied:");
        for (const m of applied) {
          console.log(`  ${m.id}  ${m.appliedAt}${m.reversible ? "" : "  (irreversible)"}`);
        }
        console.log("Pending:");
        for (const step of pending) console.log(`  ${step.id}`);
        break;
      }
      case "unlock": {
        console.log(ledger.forceUnlock() ? "🔓 Lock released" : "⏭️  No lock held");
        break;
      }
    }
  } finally {
    db.close();
  }
}

try {
  main();
} catch (error) {
  reportFailure(error);
}
