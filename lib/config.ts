import { readFileSync, existsSync } from "fs";
import { dirname, join, resolve } from "path";
import * as yaml from "js-yaml";

export interface DeployConfig {
  schemasPath: string;
  migrationsPath: string;
  databasePath: string;
  attach: Record<string, string>;
}

const DEFAULTS = {
  schemas: "schemas",
  migrations: "migrations",
  database: "data/warehouse.db",
};

/**
 * Load deploy.yml (or the file named by DEPLOY_CONFIG) and apply environment overrides.
 *
 *   schemas: schemas
 *   migrations: migrations
 *   database: data/warehouse.db
 *   attach:
 *     sales: data/sales.db
 *
 * Relative paths resolve against the directory holding the config file.
 */
export function loadConfig(
  configPath: string = process.env.DEPLOY_CONFIG || join(process.cwd(), "deploy.yml"),
  env: NodeJS.ProcessEnv = process.env
): DeployConfig {
  const baseDir = dirname(resolve(configPath));
  let parsed: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    const content = readFileSync(configPath, "utf-8");
    const loaded: unknown = yaml.load(content);
    if (loaded !== undefined && loaded !== null) {
      if (!isRecord(loaded)) {
        throw new Error(`${configPath}: expected a mapping at the top level`);
      }
      parsed = loaded;
    }
  }

  const schemas = env.SCHEMAS_PATH || readString(parsed, "schemas", configPath) || DEFAULTS.schemas;
  const migrations = env.MIGRATIONS_PATH || readString(parsed, "migrations", configPath) || DEFAULTS.migrations;
  const database = env.DATABASE_PATH || readString(parsed, "database", configPath) || DEFAULTS.database;

  const attach: Record<string, string> = {};
  for (const [namespace, file] of Object.entries(readMapping(parsed, "attach", configPath))) {
    attach[namespace] = resolvePath(baseDir, file);
  }

  return {
    schemasPath: resolvePath(baseDir, schemas),
    migrationsPath: resolvePath(baseDir, migrations),
    databasePath: resolvePath(baseDir, database),
    attach,
  };
}

function resolvePath(baseDir: string, path: string): string {
  return path === ":memory:" ? path : resolve(baseDir, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(parsed: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = parsed[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${configPath}: "${key}" must be a string`);
  }
  return value;
}

function readMapping(parsed: Record<string, unknown>, key: string, configPath: string): Record<string, string> {
  const value = parsed[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`${configPath}: "${key}" must be a mapping`);
  }

  const mapping: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`${configPath}: "${key}.${name}" must be a string`);
    }
    mapping[name] = entry;
  }
  return mapping;
}
