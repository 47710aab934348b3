import { describe, it, expect } from "vitest";
import { buildDependencyGraph, listEdges } from "../../lib/graph/builder";
import { computeWaves } from "../../lib/graph/layers";
import { schedule } from "../../lib/graph/scheduler";
import { CyclicDependencyError, DanglingReferenceError } from "../../lib/errors";
import type { Corpus, DependencyGraph } from "../../lib/types";

const table = (name: string) => ({ origin: `tables/${name}.sql`, sql: `CREATE TABLE ${name} (id INT);` });
const view = (name: string, ...refs: string[]) => ({
  origin: `views/${name}.sql`,
  sql: `CREATE VIEW ${name} AS SELECT 1 ${refs.map((r) => `FROM @@${r}@@`).join(" ")};`,
});

// mulberry32: small seeded generator so graph shapes are reproducible
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random acyclic corpus: view i only references tables and views with a lower index.
 * Declaration order is shuffled so it cannot line up with the answer.
 */
function randomAcyclicCorpus(seed: number, size: number, density: number): Corpus {
  const random = seededRandom(seed);
  const tables = ["t.a", "t.b", "t.c"];
  const views = Array.from({ length: size }, (_, i) => `v.n${String(i).padStart(3, "0")}`);

  const derived = views.map((name, i) => {
    const refs = [...tables.filter(() => random() < density), ...views.slice(0, i).filter(() => random() < density)];
    return view(name, ...refs);
  });

  for (let i = derived.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [derived[i], derived[j]] = [derived[j], derived[i]];
  }

  return { tables: tables.map(table), derived };
}

function expectCycleInGraph(graph: DependencyGraph, cycle: string[]): void {
  const edges = new Set(listEdges(graph).map(([from, to]) => `${from}->${to}`));
  expect(cycle.length).toBeGreaterThan(1);
  cycle.forEach((name, i) => {
    const next = cycle[(i + 1) % cycle.length];
    expect(edges.has(`${name}->${next}`)).toBe(true);
  });
}

describe("schedule", () => {
  it("orders the sales example with lexical tie-breaks", () => {
    const graph = buildDependencyGraph({
      tables: [table("sales.customer"), table("sales.product"), table("sales.order")],
      derived: [
        view("sales.customer_order_summary", "sales.customer", "sales.order"),
        view("sales.product_sales_overview", "sales.product", "sales.order"),
        view("sales.customer_order_total_percentage", "sales.customer_order_summary", "sales.order"),
      ],
    });

    // the percentage view is released by the summary and sorts before the overview
    expect(schedule(graph)).toEqual([
      "sales.customer_order_summary",
      "sales.customer_order_total_percentage",
      "sales.product_sales_overview",
    ]);
  });

  it("does not depend on declaration order", () => {
    const derived = [view("x.c", "x.b"), view("x.b", "x.a"), view("x.a"), view("x.d")];
    const forward = schedule(buildDependencyGraph({ tables: [], derived }));
    const backward = schedule(buildDependencyGraph({ tables: [], derived: [...derived].reverse() }));

    expect(forward).toEqual(["x.a", "x.b", "x.c", "x.d"]);
    expect(backward).toEqual(forward);
  });

  it("lets a newly ready object go before a larger key that was already waiting", () => {
    const graph = buildDependencyGraph({
      tables: [],
      derived: [view("s.b"), view("s.c"), view("s.a2", "s.b")],
    });
    expect(schedule(graph)).toEqual(["s.b", "s.a2", "s.c"]);
  });

  it("picks the smallest ready key at every step", () => {
    const graph = buildDependencyGraph({
      tables: [],
      derived: [view("z.top", "a.base"), view("b.after_mid", "m.mid"), view("m.mid"), view("a.base")],
    });
    expect(schedule(graph)).toEqual(["a.base", "m.mid", "b.after_mid", "z.top"]);
  });

  it("returns an empty plan for a corpus of tables", () => {
    expect(schedule(buildDependencyGraph({ tables: [table("t.only")], derived: [] }))).toEqual([]);
  });

  it("reports a two-object cycle", () => {
    const graph = buildDependencyGraph({ tables: [], derived: [view("V1", "V2"), view("V2", "V1")] });
    try {
      schedule(graph);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicDependencyError);
      if (error instanceof CyclicDependencyError) {
        expect(error.cycle).toEqual(["V1", "V2"]);
        expect(error.message).toBe("Circular dependency detected: V1 -> V2 -> V1");
      }
    }
  });

  it("reports a true cycle when acyclic objects hang off it", () => {
    const graph = buildDependencyGraph({
      tables: [table("t.base")],
      derived: [
        view("c.ok", "t.base"),
        view("c.one", "c.three", "c.ok"),
        view("c.two", "c.one"),
        view("c.three", "c.two"),
        view("c.tail", "c.three"),
      ],
    });
    try {
      schedule(graph);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicDependencyError);
      if (error instanceof CyclicDependencyError) {
        expect(error.cycle).toEqual(["c.one", "c.two", "c.three"]);
        expectCycleInGraph(graph, error.cycle);
      }
    }
  });

  it("fails on a cycle even when the selection avoids it", () => {
    const graph = buildDependencyGraph({
      tables: [],
      derived: [view("a.free"), view("b.x", "b.y"), view("b.y", "b.x")],
    });
    expect(() => schedule(graph, { only: ["a.free"] })).toThrow(CyclicDependencyError);
  });

  describe("with a selection", () => {
    const graph = buildDependencyGraph({
      tables: [table("s.orders"), table("s.items")],
      derived: [
        view("s.order_totals", "s.orders"),
        view("s.item_stats", "s.items"),
        view("s.report", "s.order_totals", "s.item_stats"),
      ],
    });

    it("plans everything downstream of a table", () => {
      expect(schedule(graph, { only: ["s.orders"] })).toEqual(["s.order_totals", "s.report"]);
    });

    it("includes the selected derived object itself", () => {
      expect(schedule(graph, { only: ["S.ITEM_STATS"] })).toEqual(["s.item_stats", "s.report"]);
    });

    it("rejects an unknown name", () => {
      expect(() => schedule(graph, { only: ["s.missing"] })).toThrow(DanglingReferenceError);
    });
  });

  describe("on random acyclic graphs", () => {
    const cases = [
      { seed: 1, size: 5, density: 0.5 },
      { seed: 7, size: 20, density: 0.2 },
      { seed: 42, size: 40, density: 0.1 },
      { seed: 99, size: 40, density: 0.6 },
      { seed: 2024, size: 80, density: 0.05 },
    ];

    for (const { seed, size, density } of cases) {
      it(`respects every edge (seed ${seed}, ${size} views, density ${density})`, () => {
        const corpus = randomAcyclicCorpus(seed, size, density);
        const graph = buildDependencyGraph(corpus);
        const plan = schedule(graph);

        const derived = graph.nodes.filter((n) => n.kind === "derived").map((n) => n.name);
        expect([...plan].sort()).toEqual([...derived].sort());
        expect(new Set(plan).size).toBe(plan.length);
        expect(plan.some((name) => name.startsWith("t."))).toBe(false);

        const position = new Map(plan.map((name, i) => [name, i]));
        for (const [from, to] of listEdges(graph)) {
          if (!position.has(from)) continue;
          expect(position.get(from) ?? -1).toBeLessThan(position.get(to) ?? -1);
        }

        expect(schedule(buildDependencyGraph(corpus))).toEqual(plan);
      });
    }

    it("detects a cycle planted in a random graph", () => {
      const corpus = randomAcyclicCorpus(5, 30, 0.2);
      // v.n000 now also depends on the last view, which closes a loop
      corpus.derived = corpus.derived.map((source) =>
        source.origin === "views/v.n000.sql" ? view("v.n000", "v.n029") : source
      );
      corpus.derived = corpus.derived.map((source) =>
        source.origin === "views/v.n029.sql" ? view("v.n029", "v.n000") : source
      );
      const graph = buildDependencyGraph(corpus);

      try {
        schedule(graph);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CyclicDependencyError);
        if (error instanceof CyclicDependencyError) {
          expectCycleInGraph(graph, error.cycle);
        }
      }
    });
  });
});

describe("computeWaves", () => {
  it("layers objects by their deepest derived dependency", () => {
    const graph = buildDependencyGraph({
      tables: [table("s.orders")],
      derived: [
        view("s.a", "s.orders"),
        view("s.b"),
        view("s.c", "s.a"),
        view("s.d", "s.c", "s.b"),
        view("s.e", "s.a"),
      ],
    });

    expect(computeWaves(graph)).toEqual([
      { wave: 0, objects: ["s.a", "s.b"] },
      { wave: 1, objects: ["s.c", "s.e"] },
      { wave: 2, objects: ["s.d"] },
    ]);
  });
});
