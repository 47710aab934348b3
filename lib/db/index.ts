import Database from "better-sqlite3";
import { readFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

// Namespaces map to attached database files so "sales.customer" resolves in SQLite
const ATTACH_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/i;

export interface OpenDatabaseOptions {
  attach?: Record<string, string>;
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  for (const [namespace, file] of Object.entries(options.attach ?? {})) {
    if (!ATTACH_NAME_PATTERN.test(namespace)) {
      throw new Error(`Invalid namespace "${namespace}" in attach list`);
    }
    if (file !== ":memory:") {
      mkdirSync(dirname(file), { recursive: true });
    }
    db.prepare(`ATTACH DATABASE ? AS ${namespace}`).run(file);
  }

  initLedgerSchema(db);
  return db;
}

export function initLedgerSchema(db: Database.Database): void {
  db.exec(readFileSync(SCHEMA_PATH, "utf-8"));
}
