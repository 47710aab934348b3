import { describe, it, expect } from "vitest";
import { formatError } from "../../lib/report";
import { CyclicDependencyError, DanglingReferenceError, DuplicateDeclarationError } from "../../lib/errors";
import { NotAppliedError } from "../../lib/migrations/errors";

describe("formatError", () => {
  it("prints the full cycle path", () => {
    expect(formatError(new CyclicDependencyError(["a.one", "a.two", "a.three"]))).toEqual([
      "[CYCLIC_DEPENDENCY] Circular dependency detected: a.one -> a.two -> a.three -> a.one",
      "  cycle: a.one -> a.two -> a.three -> a.one",
    ]);
  });

  it("lists the objects of a planning error", () => {
    expect(formatError(new DanglingReferenceError("sales.nonexistent_table", "sales.report"))).toEqual([
      '[DANGLING_REFERENCE] "sales.report" references "sales.nonexistent_table", which is neither a known table nor a defined object',
      "  objects: sales.nonexistent_table, sales.report",
    ]);
    expect(formatError(new DuplicateDeclarationError("s.x", ["a.sql", "b.sql"]))[1]).toBe("  objects: s.x");
  });

  it("prints ledger errors with their code", () => {
    expect(formatError(new NotAppliedError(4))).toEqual(["[NOT_APPLIED] Migration 4 has not been applied"]);
  });

  it("falls back to the message or the value", () => {
    expect(formatError(new Error("boom"))).toEqual(["boom"]);
    expect(formatError("plain")).toEqual(["plain"]);
  });
});
