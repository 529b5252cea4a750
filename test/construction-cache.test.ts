import { afterEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import type { LazyOutField } from "../src/lazy/lazy-field.js";
import { defineFunction } from "../src/task/function-task.js";
import { defineWorkflow } from "../src/task/graph-task.js";
import { t } from "../src/types/field-type.js";
import { setLogSink } from "../src/utils/logger.js";
import { ConstructionCache, constructionKey, defaultConstructionCache } from "../src/workflow/construction-cache.js";
import { Workflow } from "../src/workflow/workflow.js";

const Seed = defineFunction(function seed() {
  return 1;
}, { returns: t.int });

const Add = defineFunction(function add(a: number, b: number) {
  return a + b;
}, { inputs: { a: t.int, b: t.int }, returns: t.int });

const Inner = defineWorkflow({
  name: "Inner",
  inputs: { a: t.int, b: t.int },
  returns: t.int,
  build: ({ a, b }, wf) => wf.add(Add.create({ a, b })).lzout.out,
});

function seedOut(): LazyOutField {
  const Source = defineWorkflow({ name: "Source", build: (_inputs, wf) => wf.add(Seed.create()).lzout.out });
  return Workflow.construct(Source.create(), { cache: false }).node("seed").lzout.out;
}

afterEach(() => {
  defaultConstructionCache.clear();
  resetConfig();
  setLogSink();
});

describe("Workflow.construct caching", () => {
  it("returns the same graph for equal concrete inputs", () => {
    const first = Workflow.construct(Inner.create({ a: 1, b: 2 }));
    const second = Workflow.construct(Inner.create({ a: 1, b: 2 }));
    expect(second).toBe(first);
    expect(defaultConstructionCache.size).toBe(1);
  });

  it("builds a new graph when a concrete input changes", () => {
    const lazy = seedOut();
    const withOne = Workflow.construct(Inner.create({ a: lazy, b: 1 }));
    const withTwo = Workflow.construct(Inner.create({ a: lazy, b: 2 }));
    expect(withTwo).not.toBe(withOne);
    expect(withOne.inputs.get("b")).toBe(1);
    expect(withTwo.inputs.get("b")).toBe(2);
  });

  it("reuses a graph built while an input was lazy once that input is known", () => {
    const lazy = seedOut();
    Workflow.construct(Inner.create({ a: lazy, b: 1 }));
    const withTwo = Workflow.construct(Inner.create({ a: lazy, b: 2 }));

    expect(Workflow.construct(Inner.create({ a: 7, b: 2 }))).toBe(withTwo);
    expect(Workflow.construct(Inner.create({ a: 8, b: 2 }))).toBe(withTwo);
    expect(Workflow.construct(Inner.create({ a: 7, b: 3 }))).not.toBe(withTwo);
  });

  it("bypasses the shared cache when caching is disabled", () => {
    configure({ cache: { enabled: false } });
    const first = Workflow.construct(Inner.create({ a: 1, b: 2 }));
    expect(Workflow.construct(Inner.create({ a: 1, b: 2 }))).not.toBe(first);
    expect(defaultConstructionCache.size).toBe(0);
  });

  it("uses an injected cache for the workflow and its nested workflows", () => {
    const cache = new ConstructionCache();
    const Outer = defineWorkflow({
      name: "Outer",
      inputs: { x: t.int },
      build: ({ x }, wf) => wf.add(Inner.create({ a: x, b: 1 })).lzout.out,
    });
    const wf = Workflow.construct(Outer.create({ x: 5 }), { cache });
    const nested = wf.node("Inner").nestedWorkflow();

    expect(wf.cache).toBe(cache);
    expect(cache.size).toBe(2);
    expect(Workflow.construct(Inner.create({ a: 5, b: 1 }), { cache })).toBe(nested);
    expect(defaultConstructionCache.size).toBe(0);
  });
});

describe("ConstructionCache", () => {
  it("keys constructions by their concrete inputs", () => {
    const key = constructionKey(Inner.create({ a: seedOut(), b: 1 }));
    expect(key.names).toEqual(["b", "constructor"]);
    expect(key.hash).toBe(Inner.create({ a: 9, b: 1 }).computeHashes(["b", "constructor"]).hash);
  });

  it("groups entries by concrete input names", () => {
    const cache = new ConstructionCache();
    const lazy = seedOut();
    Workflow.construct(Inner.create({ a: lazy, b: 1 }), { cache });
    Workflow.construct(Inner.create({ a: lazy, b: 2 }), { cache });
    Workflow.construct(Inner.create({ a: 1, b: 5 }), { cache });

    expect(cache.groups(Inner)).toEqual([
      ["b", "constructor"],
      ["a", "b", "constructor"],
    ]);
    expect(cache.size).toBe(3);
  });

  it("counts hits and misses", () => {
    const cache = new ConstructionCache();
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });

    expect(cache.getStats()).toEqual({ groups: 1, entries: 1, hits: 2, misses: 1, hitRate: 2 / 3 });
  });

  it("clears one specification or everything", () => {
    const cache = new ConstructionCache();
    const Other = defineWorkflow({ name: "Other", build: (_inputs, wf) => wf.add(Seed.create()).lzout.out });
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });
    Workflow.construct(Other.create(), { cache });

    cache.clear(Inner);
    expect(cache.groups(Inner)).toEqual([]);
    expect(cache.size).toBe(1);
    expect(cache.getStats().hits).toBe(1);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.getStats()).toEqual({ groups: 0, entries: 0, hits: 0, misses: 0, hitRate: 0 });
  });

  it("logs lookups at debug level", () => {
    const lines: string[] = [];
    setLogSink((_level, line) => lines.push(line));
    configure({ log: { level: "debug" } });
    const cache = new ConstructionCache();
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });
    Workflow.construct(Inner.create({ a: 1, b: 2 }), { cache });

    expect(lines.filter((l) => l.includes("[DEBUG] Construction cache miss"))).toHaveLength(1);
    expect(lines.filter((l) => l.includes("[DEBUG] Construction cached"))).toHaveLength(1);
    expect(lines.filter((l) => l.includes("[DEBUG] Construction cache hit"))).toHaveLength(1);
  });
});
