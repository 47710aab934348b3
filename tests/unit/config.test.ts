import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig } from "../../lib/config";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "deploy-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults next to a missing file", () => {
    expect(loadConfig(join(dir, "deploy.yml"), {})).toEqual({
      schemasPath: join(dir, "schemas"),
      migrationsPath: join(dir, "migrations"),
      databasePath: join(dir, "data/warehouse.db"),
      attach: {},
    });
  });

  it("resolves file values against the file's directory", () => {
    const path = join(dir, "deploy.yml");
    writeFileSync(path, "schemas: sql/schemas\ndatabase: ':memory:'\nattach:\n  sales: data/sales.db\n");

    expect(loadConfig(path, {})).toEqual({
      schemasPath: join(dir, "sql/schemas"),
      migrationsPath: join(dir, "migrations"),
      databasePath: ":memory:",
      attach: { sales: join(dir, "data/sales.db") },
    });
  });

  it("lets the environment override the file", () => {
    const path = join(dir, "deploy.yml");
    writeFileSync(path, "schemas: sql/schemas\n");

    const config = loadConfig(path, { SCHEMAS_PATH: "/srv/schemas", MIGRATIONS_PATH: "steps" });
    expect(config.schemasPath).toBe("/srv/schemas");
    expect(config.migrationsPath).toBe(join(dir, "steps"));
  });

  it("rejects values of the wrong type", () => {
    const path = join(dir, "deploy.yml");
    writeFileSync(path, "schemas: [a, b]\n");
    expect(() => loadConfig(path, {})).toThrow(`${path}: "schemas" must be a string`);
  });

  it("rejects a non-string attach entry", () => {
    const path = join(dir, "deploy.yml");
    writeFileSync(path, "attach:\n  sales: 3\n");
    expect(() => loadConfig(path, {})).toThrow(`${path}: "attach.sales" must be a string`);
  });
});
