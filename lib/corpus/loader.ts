import { readFileSync, existsSync, readdirSync, statSync } from "fs";
import { join, relative, sep } from "path";
import type { Corpus, DefinitionSource } from "../types";

const TABLES_DIR = "tables";

/**
 * Load a schema tree laid out as
 *
 *   <root>/<namespace>/tables/*.sql   base tables
 *   <root>/<namespace>/<other>/*.sql  views, materialized views, functions
 *
 * Origins are paths relative to the root, with forward slashes.
 */
export function loadCorpus(root: string): Corpus {
  if (!existsSync(root)) {
    throw new Error(`Schema directory not found at ${root}`);
  }

  const corpus: Corpus = { tables: [], derived: [] };

  for (const namespace of sortedEntries(root)) {
    const namespacePath = join(root, namespace);
    if (!statSync(namespacePath).isDirectory()) continue;

    for (const group of sortedEntries(namespacePath)) {
      const groupPath = join(namespacePath, group);
      if (!statSync(groupPath).isDirectory()) continue;

      const target = group === TABLES_DIR ? corpus.tables : corpus.derived;
      for (const file of findSqlFiles(groupPath)) {
        target.push(readSource(root, file));
      }
    }
  }

  return corpus;
}

function readSource(root: string, path: string): DefinitionSource {
  return {
    origin: relative(root, path).split(sep).join("/"),
    sql: readFileSync(path, "utf-8"),
  };
}

function sortedEntries(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function findSqlFiles(dir: string): string[] {
  const sqlFiles: string[] = [];

  function walkDir(current: string): void {
    for (const entry of sortedEntries(current)) {
      const fullPath = join(current, entry);
      const stat = statSync(fullPath);

      if (stat.isDirectory()) {
        walkDir(fullPath);
      } else if (entry.endsWith(".sql")) {
        sqlFiles.push(fullPath);
      }
    }
  }

  walkDir(dir);
  return sqlFiles;
}
