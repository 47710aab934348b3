import { DuplicateDeclarationError } from "../errors";
import type { ObjectKind, ParsedDefinition } from "../types";

export interface ObjectRegistry {
  tables: Map<string, ParsedDefinition>;
  derived: Map<string, ParsedDefinition>;
}

/**
 * Index every declared table and derived object by key.
 * A name may be declared once across both sets.
 */
export function createRegistry(tables: ParsedDefinition[], derived: ParsedDefinition[]): ObjectRegistry {
  const registry: ObjectRegistry = { tables: new Map(), derived: new Map() };

  const register = (target: Map<string, ParsedDefinition>, definition: ParsedDefinition) => {
    const existing = registry.tables.get(definition.key) ?? registry.derived.get(definition.key);
    if (existing) {
      throw new DuplicateDeclarationError(definition.name, [existing.origin, definition.origin]);
    }
    target.set(definition.key, definition);
  };

  for (const table of tables) register(registry.tables, table);
  for (const definition of derived) register(registry.derived, definition);

  return registry;
}

/**
 * Known table names are tables; anything else is treated as a derived object,
 * whether or not a definition for it exists yet.
 */
export function classify(registry: ObjectRegistry, key: string): ObjectKind {
  return registry.tables.has(key) ? "table" : "derived";
}
