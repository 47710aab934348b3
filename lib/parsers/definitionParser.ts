import { MalformedDefinitionError } from "../errors";
import type { DefinitionSource, ObjectReference, ParsedDefinition, StatementKind } from "../types";

/**
 * Pattern-based extraction of the object a definition creates and the objects
 * it depends on. No SQL parsing happens here: only the creation header and the
 * @@name@@ dependency markers are recognized, anything else is ignored.
 */

// CREATE [OR REPLACE] [MATERIALIZED] TABLE|VIEW [IF NOT EXISTS] <name>
const CREATE_PATTERN =
  /\bCREATE\s+(?:OR\s+REPLACE\s+)?(?:MATERIALIZED\s+)?(TABLE|VIEW)\s+(?:IF\s+NOT\s+EXISTS\s+)?([a-z0-9_.]+)/gi;

// @@namespace.object@@
const MARKER_PATTERN = /@@([a-z0-9_.]+)@@/gi;

export function normalizeName(name: string): string {
  return name.toLowerCase();
}

/**
 * Remove `--` line comments and `/* *\/` block comments.
 * Single-quoted literals are copied through untouched.
 */
export function stripComments(sql: string): string {
  let out = "";
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'") {
      // '' is an escaped quote inside a literal
      let end = i + 1;
      while (end < sql.length) {
        if (sql[end] === "'") {
          if (sql[end + 1] === "'") {
            end += 2;
            continue;
          }
          break;
        }
        end++;
      }
      out += sql.slice(i, end + 1);
      i = end + 1;
    } else if (ch === "-" && next === "-") {
      const newline = sql.indexOf("\n", i);
      i = newline === -1 ? sql.length : newline;
      out += " ";
    } else if (ch === "/" && next === "*") {
      const close = sql.indexOf("*/", i + 2);
      i = close === -1 ? sql.length : close + 2;
      out += " ";
    } else {
      out += ch;
      i++;
    }
  }

  return out;
}

export interface DeclaredObject {
  name: string;
  key: string;
  statement: StatementKind;
}

/**
 * Find the single object a definition creates.
 * Repeating the same name (e.g. a DROP/CREATE pair) is fine; two different names are not.
 */
export function extractDeclaredName(source: DefinitionSource): DeclaredObject {
  const text = stripComments(source.sql);
  const declared = new Map<string, DeclaredObject>();

  for (const match of text.matchAll(CREATE_PATTERN)) {
    const name = match[2];
    const key = normalizeName(name);
    if (!declared.has(key)) {
      declared.set(key, {
        name,
        key,
        statement: match[1].toUpperCase() === "TABLE" ? "table" : "view",
      });
    }
  }

  const found = [...declared.values()];
  if (found.length === 0) {
    throw new MalformedDefinitionError(source.origin, "no CREATE TABLE or CREATE VIEW statement found");
  }
  if (found.length > 1) {
    throw new MalformedDefinitionError(
      source.origin,
      `declares more than one object (${found.map((d) => d.name).join(", ")})`,
      found.map((d) => d.name)
    );
  }
  return found[0];
}

/**
 * Collect the @@name@@ markers of a definition, duplicates collapsed by key.
 * The first spelling seen is kept for diagnostics.
 */
export function extractReferences(sql: string): ObjectReference[] {
  const text = stripComments(sql);
  const references = new Map<string, ObjectReference>();

  for (const match of text.matchAll(MARKER_PATTERN)) {
    const name = match[1];
    const key = normalizeName(name);
    if (!references.has(key)) {
      references.set(key, { name, key });
    }
  }

  return [...references.values()];
}

/**
 * Parse a derived-object source: declared name plus dependency markers.
 */
export function parseDefinition(source: DefinitionSource): ParsedDefinition {
  const declared = extractDeclaredName(source);
  const references = extractReferences(source.sql);

  const self = references.find((ref) => ref.key === declared.key);
  if (self) {
    throw new MalformedDefinitionError(source.origin, `"${declared.name}" references itself`, [declared.name]);
  }

  return {
    origin: source.origin,
    name: declared.name,
    key: declared.key,
    statement: declared.statement,
    references,
    sql: source.sql,
  };
}

/**
 * Parse a table source. Only the declared name matters; markers are not read.
 */
export function parseTableDefinition(source: DefinitionSource): ParsedDefinition {
  const declared = extractDeclaredName(source);
  if (declared.statement !== "table") {
    throw new MalformedDefinitionError(
      source.origin,
      `expected a CREATE TABLE statement but found a view "${declared.name}"`,
      [declared.name]
    );
  }

  return {
    origin: source.origin,
    name: declared.name,
    key: declared.key,
    statement: "table",
    references: [],
    sql: source.sql,
  };
}

/**
 * Quote each dot-separated part of a name, so `sales.order` becomes `"sales"."order"`.
 */
export function quoteName(name: string): string {
  return name
    .split(".")
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join(".");
}

/**
 * Replace every dependency marker by the quoted name it wraps, so reserved words
 * such as `order` survive as identifiers.
 */
export function renderDefinition(sql: string): string {
  return sql.replace(MARKER_PATTERN, (_marker, name: string) => quoteName(name));
}
