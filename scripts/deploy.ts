/**
 * Apply pending migrations, then create every derived object in dependency order.
 *
 * Usage:
 *   npx tsx scripts/deploy.ts [options]
 *
 * Options:
 *   --dry-run      Show the plan and pending migrations without running anything
 *   --only=a,b     Recreate only these objects and everything built on them
 *
 * Environment variables:
 *   DEPLOY_CONFIG    Path to deploy.yml (default: ./deploy.yml)
 *   DATABASE_PATH    SQLite database to deploy to (overrides deploy.yml)
 *   SCHEMAS_PATH     Root of the schema tree (overrides deploy.yml)
 *   MIGRATIONS_PATH  Migration directory (overrides deploy.yml)
 */

import { loadConfig } from "../lib/config";
import { loadCorpus } from "../lib/corpus/loader";
import { openDatabase } from "../lib/db";
import { deploy } from "../lib/deploy/deployer";
import { SqliteMigrationLedger } from "../lib/migrations/ledger";
import { loadMigrations } from "../lib/migrations/loader";
import { reportFailure } from "../lib/report";

interface CliOptions {
  dryRun: boolean;
  only?: string[];
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const only = args.find((a) => a.startsWith("--only="))?.split("=")[1];

  return {
    dryRun: args.includes("--dry-run"),
    only: only ? only.split(",").map((name) => name.trim()).filter(Boolean) : undefined,
  };
}

function main(): void {
  const options = parseArgs();
  const config = loadConfig();

  console.log("🚀 Deploying...\n");
  console.log(`   Schemas:    ${config.schemasPath}`);
  console.log(`   Migrations: ${config.migrationsPath}`);
  console.log(`   Database:   ${config.databasePath}\n`);

  const corpus = loadCorpus(config.schemasPath);
  const migrations = loadMigrations(config.migrationsPath);
  const db = openDatabase(config.databasePath, { attach: config.attach });

  try {
    const ledger = new SqliteMigrationLedger(db);
    const result = deploy({
      corpus,
      migrations,
      ledger,
      target: db,
      only: options.only,
      dryRun: options.dryRun,
    });

    if (result.dryRun) {
      console.log("\n📋 Pending migrations:");
      for (const id of result.pendingMigrations) console.log(`   ${id}`);
      console.log("\n📋 Deployment order:");
      result.plan.forEach((name, i) => console.log(`   ${i + 1}. ${name}`));
      return;
    }

    console.log(`\n✅ Applied ${result.appliedMigrations.length} migration(s), created ${result.deployed.length} object(s)`);
  } finally {
    db.close();
  }
}

try {
  main();
} catch (error) {
  reportFailure(error);
}
