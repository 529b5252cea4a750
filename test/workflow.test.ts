import { afterEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { ConstructionError, StateError } from "../src/errors.js";
import { isLazy } from "../src/lazy/lazy-field.js";
import { describeState } from "../src/state/state.js";
import { defineFunction } from "../src/task/function-task.js";
import { defineWorkflow, type GraphTask } from "../src/task/graph-task.js";
import { t } from "../src/types/field-type.js";
import { Workflow } from "../src/workflow/workflow.js";

const Mul = defineFunction(function mul(x: number, y: number) {
  return x * y;
}, { name: "Mul", inputs: { x: t.int, y: t.int }, returns: t.int });

const Add = defineFunction(function add(x: number, y: number) {
  return x + y;
}, { name: "Add", inputs: { x: t.int, y: t.int }, returns: t.int });

const Sum = defineFunction(function sum(values: number[]) {
  return values.reduce((acc, v) => acc + v, 0);
}, { name: "Sum", inputs: { values: t.list(t.int) }, returns: t.int });

const Seed = defineFunction(function seed() {
  return 1;
}, { returns: t.int });

/** Construct a throwaway workflow whose single output takes whatever `build` returns. */
function construct(build: (wf: Workflow) => unknown): Workflow {
  const Scratch = defineWorkflow({ name: "Scratch", outputs: { out: t.any }, build: (_inputs, wf) => build(wf) });
  return Workflow.construct(Scratch.create(), { cache: false });
}

function seedOut() {
  return construct((wf) => wf.add(Seed.create()).lzout.out).node("seed").lzout.out;
}

afterEach(() => {
  resetConfig();
});

describe("split and combine", () => {
  it("splits over two fields and combines one", () => {
    const wf = construct((wf) => wf.add(Mul.create().split({ x: [1, 2, 3], y: [1, 2, 3] }).combine("x")).lzout.out);
    const mul = wf.node("Mul");

    expect(mul.splitter).toEqual(["Mul.x", "Mul.y"]);
    expect(mul.combiner).toEqual(["Mul.x"]);
    expect(mul.state.openAxes.map((a) => a.name)).toEqual(["Mul.y"]);
    expect(mul.state.executions).toBe(9);
  });

  it("lets a downstream node combine an inherited axis", () => {
    const wf = construct((wf) => {
      const mul = wf.add(Mul.create().split({ x: [1, 2, 3], y: [1, 2, 3] }));
      return wf.add(Add.create({ x: mul.lzout.out, y: 1 }).combine("Mul.x")).lzout.out;
    });
    const add = wf.node("Add");

    expect(add.splitter).toEqual([{ inherit: "Mul" }]);
    expect(add.combiner).toEqual(["Mul.x"]);
    expect(describeState(add.state).splitter).toEqual(["_Mul"]);
    expect(add.state.openAxes.map((a) => a.name)).toEqual(["Mul.y"]);
    expect(wf.node("Mul").combiner).toEqual([]);
  });

  it("types the outputs of a combining node as lists", () => {
    const wf = construct((wf) => wf.add(Mul.create({ y: 2 }).split({ x: [1, 2] }).combine("x")).lzout.out);
    expect(wf.node("Mul").lzout.out.type.name).toBe("list[int]");
  });

  it("rejects combining an axis the node does not have", () => {
    expect(() => construct((wf) => wf.add(Mul.create({ x: 1, y: 2 }).combine("x")).lzout.out)).toThrow(
      'Cannot combine "x" on node "Mul"',
    );
  });

  it("absorbs open axes into a list input", () => {
    const wf = construct((wf) => {
      const mul = wf.add(Mul.create({ y: 2 }).split({ x: [1, 2, 3] }));
      return wf.add(Sum.create({ values: mul.lzout.out })).lzout.out;
    });
    const sum = wf.node("Sum");

    expect(sum.splitter).toEqual([]);
    expect(sum.state.openAxes).toEqual([]);
    expect(sum.dependsOn).toEqual(["Mul"]);
  });

  it("refuses to absorb under the inherit policy", () => {
    configure({ state: { absorbPolicy: "inherit" } });
    expect(() =>
      construct((wf) => {
        const mul = wf.add(Mul.create({ y: 2 }).split({ x: [1, 2, 3] }));
        return wf.add(Sum.create({ values: mul.lzout.out })).lzout.out;
      }),
    ).toThrow('Cannot bind lazy(Mul.out) of type int to input "values" of "Sum", which expects list[int]');
  });

  it("splits over a lazy sequence of unknown length", () => {
    const Range = defineFunction(function range(n: number) {
      return Array.from({ length: n }, (_, i) => i);
    }, { inputs: { n: t.int }, returns: t.list(t.int) });
    const wf = construct((wf) => {
      const range = wf.add(Range.create({ n: 3 }));
      return wf.add(Mul.create({ y: 2 }).split({ x: range.lzout.out })).lzout.out;
    });
    const mul = wf.node("Mul");

    expect(mul.splitter).toEqual(["Mul.x"]);
    expect(mul.dependsOn).toEqual(["range"]);
    expect(mul.state.executions).toBeUndefined();
  });
});

describe("adding nodes", () => {
  it("keys lzout by the output names of the task", () => {
    const SumDiff = defineFunction(function sumDiff(a: number, b: number) {
      return [a + b, a - b];
    }, { name: "SumDiff", outputs: { sum: t.int, diff: t.int } });
    const wf = construct((wf) => {
      const node = wf.add(SumDiff.create({ a: 3, b: 1 }));
      expect(Object.keys(node.lzout)).toEqual(["sum", "diff"]);
      return node.lzout.diff;
    });
    expect(String(wf.outputs.get("out"))).toBe("lazy(SumDiff.diff)");
  });

  it("derives unique names from the task name", () => {
    const wf = construct((wf) => {
      wf.add(Add.create({ x: 1, y: 2 }));
      wf.add(Add.create({ x: 3, y: 4 }));
      return wf.add(Add.create({ x: 5, y: 6 })).lzout.out;
    });
    expect(wf.nodeNames).toEqual(["Add", "Add_2", "Add_3"]);
    expect(wf.node("Add_2").index).toBe(1);
  });

  it("joins the counter with the configured separator", () => {
    configure({ naming: { separator: "__" } });
    const wf = construct((wf) => {
      wf.add(Add.create({ x: 1, y: 2 }));
      return wf.add(Add.create({ x: 3, y: 4 })).lzout.out;
    });
    expect(wf.nodeNames).toEqual(["Add", "Add__2"]);
  });

  it("takes explicit names", () => {
    const wf = construct((wf) => wf.add(Add.create({ x: 1, y: 2 }), { name: "first" }).lzout.out);
    expect(wf.nodeNames).toEqual(["first"]);
    expect(wf.hasNode("Add")).toBe(false);
  });

  it("rejects duplicate and invalid explicit names", () => {
    expect(() =>
      construct((wf) => {
        wf.add(Add.create({ x: 1, y: 2 }), { name: "first" });
        return wf.add(Add.create({ x: 1, y: 2 }), { name: "first" }).lzout.out;
      }),
    ).toThrow('Workflow "Scratch" already has a node named "first"');
    expect(() => construct((wf) => wf.add(Add.create({ x: 1, y: 2 }), { name: "1st" }).lzout.out)).toThrow(
      'Invalid node name "1st": must be a valid identifier',
    );
  });

  it("requires every required input", () => {
    expect(() => construct((wf) => wf.add(Add.create({ x: 1 })).lzout.out)).toThrow(
      'Node "Add" is missing required inputs: y',
    );
  });

  it("consumes the instance", () => {
    const instance = Add.create({ x: 1, y: 2 });
    construct((wf) => wf.add(instance).lzout.out);
    expect(instance.consumedBy).toBe("Add");
    expect(() => instance.set("x", 3)).toThrow('owned by node "Add"');
  });

  it("adds a consumed instance only as a copy", () => {
    expect(() =>
      construct((wf) => {
        const instance = Add.create({ x: 1, y: 2 });
        wf.add(instance);
        return wf.add(instance).lzout.out;
      }),
    ).toThrow("add a copy() instead");

    const wf = construct((wf) => {
      const instance = Add.create({ x: 1, y: 2 });
      wf.add(instance);
      return wf.add(instance.copy()).lzout.out;
    });
    expect(wf.nodeNames).toEqual(["Add", "Add_2"]);
  });

  it("rejects outputs of another workflow", () => {
    const foreign = seedOut();
    expect(() => construct((wf) => wf.add(Add.create({ x: foreign, y: 1 })).lzout.out)).toThrow(
      'Input "x" of node "Add" refers to node "seed", which is not part of workflow "Scratch"',
    );
  });

  it("reports unknown nodes and outputs", () => {
    const wf = construct((wf) => wf.add(Add.create({ x: 1, y: 2 })).lzout.out);
    expect(() => wf.node("Mul")).toThrow('Workflow "Scratch" has no node "Mul" (nodes: Add)');
    expect(() => wf.node("Add").output("sum")).toThrow('Node "Add" has no output "sum" (outputs: out)');
  });
});

describe("setInput", () => {
  it("locks the state of an observed node", () => {
    expect(() =>
      construct((wf) => {
        const mul = wf.add(Mul.create().split({ x: [1, 2], y: [3] }));
        const add = wf.add(Add.create({ x: mul.lzout.out, y: 1 }));
        wf.add(Add.create({ x: add.lzout.out, y: 2 }));
        add.setInput("x", 5);
        return add.lzout.out;
      }),
    ).toThrow(StateError);

    expect(() =>
      construct((wf) => {
        const mul = wf.add(Mul.create().split({ x: [1, 2], y: [3] }));
        const add = wf.add(Add.create({ x: mul.lzout.out, y: 1 }));
        wf.add(Add.create({ x: add.lzout.out, y: 2 }));
        add.setInput("x", 5);
        return add.lzout.out;
      }),
    ).toThrow(
      'Outputs of node "Add" have already been accessed and therefore cannot set input "x": its open axes would change from (Mul.x, Mul.y) to (none)',
    );
  });

  it("allows changes that keep the state of an observed node", () => {
    const wf = construct((wf) => {
      const mul = wf.add(Mul.create().split({ x: [1, 2], y: [3] }));
      const add = wf.add(Add.create({ x: mul.lzout.out, y: 1 }));
      wf.add(Add.create({ x: add.lzout.out, y: 2 }));
      add.setInput("y", 7);
      return add.lzout.out;
    });
    expect(wf.node("Add").inputs.y).toBe(7);
    expect(wf.node("Add").observed).toBe(true);
  });

  it("leaves the other converted inputs alone", () => {
    const Offset = defineFunction(function offset(a: number, b: number) {
      return a + b;
    }, { name: "Offset", inputs: { a: { type: t.int, converter: (v) => Number(v) * 10 }, b: t.int }, returns: t.int });
    const wf = construct((wf) => {
      const node = wf.add(Offset.create({ a: 1, b: 2 }));
      node.setInput("b", 5);
      node.setInput("b", 6);
      return node.lzout.out;
    });
    expect(wf.node("Offset").inputs.a).toBe(10);
    expect(wf.node("Offset").inputs.b).toBe(6);
  });

  it("lets an unobserved node change its state", () => {
    const wf = construct((wf) => {
      const mul = wf.add(Mul.create().split({ x: [1, 2], y: [3] }));
      const add = wf.add(Add.create({ x: 1, y: 1 }));
      add.setInput("x", mul.lzout.out);
      return add.lzout.out;
    });
    expect(wf.node("Add").splitter).toEqual([{ inherit: "Mul" }]);
    expect(wf.node("Add").dependsOn).toEqual(["Mul"]);
  });

  it("rejects references to later nodes", () => {
    expect(() =>
      construct((wf) => {
        const first = wf.add(Add.create({ x: 1, y: 1 }));
        const second = wf.add(Add.create({ x: 2, y: 2 }));
        first.setInput("x", second.lzout.out);
        return first.lzout.out;
      }),
    ).toThrow('Input "x" of node "Add" refers to node "Add_2", which does not come before it');
  });
});

describe("outputs", () => {
  const Stats = (build: (wf: Workflow) => unknown) =>
    defineWorkflow({
      name: "Stats",
      outputs: { total: t.int, product: t.int },
      build: (_inputs, wf) => build(wf),
    });

  it("binds returned arrays positionally", () => {
    const Task = Stats((wf) => [wf.add(Add.create({ x: 2, y: 3 })).lzout.out, wf.add(Mul.create({ x: 2, y: 3 })).lzout.out]);
    const wf = Workflow.construct(Task.create(), { cache: false });
    expect(String(wf.outputs.get("total"))).toBe("lazy(Add.out)");
    expect(String(wf.outputs.get("product"))).toBe("lazy(Mul.out)");
    expect(wf.isSealed).toBe(true);
  });

  it("binds outputs assigned during construction", () => {
    const Task = Stats((wf) => {
      wf.outputs.set("total", wf.add(Add.create({ x: 2, y: 3 })).lzout.out);
      wf.outputs.set("product", 6);
      return undefined;
    });
    const wf = Workflow.construct(Task.create(), { cache: false });
    expect(wf.outputs.has("total")).toBe(true);
    expect(wf.outputs.get("product")).toBe(6);
  });

  it("rejects outputs bound twice", () => {
    const Task = Stats((wf) => {
      wf.outputs.set("total", 5);
      return [5, 6];
    });
    expect(() => Workflow.construct(Task.create(), { cache: false })).toThrow(
      'Output "total" of workflow "Stats" is already bound',
    );
  });

  it("rejects unbound and unknown outputs", () => {
    const Unbound = Stats((wf) => {
      wf.outputs.set("total", 5);
      return undefined;
    });
    expect(() => Workflow.construct(Unbound.create(), { cache: false })).toThrow(
      'Workflow "Stats" did not bind outputs product',
    );
    const Unknown = Stats((wf) => {
      wf.outputs.set("mean", 5);
      return [1, 2];
    });
    expect(() => Workflow.construct(Unknown.create(), { cache: false })).toThrow(
      'Workflow "Stats" has no output "mean" (outputs: total, product)',
    );
  });

  it("checks the type of bound values", () => {
    const Task = Stats(() => [1, "two"]);
    expect(() => Workflow.construct(Task.create(), { cache: false })).toThrow(
      'Value bound to output "product" of workflow "Stats" does not match type int',
    );
  });

  it("gathers outputs of split nodes into lists", () => {
    const Gathered = defineWorkflow({
      name: "Gathered",
      outputs: { out: t.list(t.int) },
      build: (_inputs, wf) => wf.add(Mul.create({ y: 2 }).split({ x: [1, 2] })).lzout.out,
    });
    const wf = Workflow.construct(Gathered.create(), { cache: false });
    const out = wf.outputs.get("out");
    expect(String(out)).toBe("lazy(Mul.out)");
    expect(isLazy(out) && out.type.name).toBe("list[int]");
    expect(wf.node("Mul").observed).toBe(true);

    const Scalar = defineWorkflow({
      name: "Scalar",
      outputs: { out: t.int },
      build: (_inputs, wf) => wf.add(Mul.create({ y: 2 }).split({ x: [1, 2] })).lzout.out,
    });
    expect(() => Workflow.construct(Scalar.create(), { cache: false })).toThrow(
      'Cannot bind lazy(Mul.out) of type list[int] to output "out" of workflow "Scalar", which expects int',
    );
  });
});

describe("sealed workflows", () => {
  it("rejects changes after construction", () => {
    const wf = construct((wf) => wf.add(Add.create({ x: 1, y: 2 })).lzout.out);
    expect(() => wf.add(Add.create({ x: 1, y: 2 }))).toThrow(ConstructionError);
    expect(() => wf.add(Add.create({ x: 1, y: 2 }))).toThrow(
      'Workflow "Scratch" is already constructed; cannot add "Add"',
    );
    expect(() => wf.outputs.set("out", 1)).toThrow("is already constructed");
    expect(() => wf.node("Add").setInput("x", 3)).toThrow("is already constructed");
  });
});

describe("construction", () => {
  it("branches on concrete inputs", () => {
    const Branch = defineWorkflow({
      name: "Branch",
      inputs: { double: t.bool, x: t.int },
      build: ({ double, x }, wf) =>
        double === true ? wf.add(Mul.create({ x, y: 2 })).lzout.out : wf.add(Add.create({ x, y: 0 })).lzout.out,
    });
    expect(Workflow.construct(Branch.create({ double: true, x: 3 }), { cache: false }).nodeNames).toEqual(["Mul"]);
    expect(Workflow.construct(Branch.create({ double: false, x: 3 }), { cache: false }).nodeNames).toEqual(["Add"]);
  });

  it("refuses arithmetic on lazy inputs", () => {
    const Threshold = defineWorkflow({
      name: "Threshold",
      inputs: { x: t.int },
      build: ({ x }, wf) =>
        Number(x) > 0 ? wf.add(Add.create({ x, y: 1 })).lzout.out : wf.add(Add.create({ x, y: -1 })).lzout.out,
    });
    expect(() => Workflow.construct(Threshold.create({ x: seedOut() }), { cache: false })).toThrow(
      "lazy(Threshold.x) has no value during construction",
    );
  });

  it("requires the workflow's required inputs", () => {
    const Needs = defineWorkflow({ name: "Needs", inputs: { x: t.int }, build: ({ x }) => x });
    expect(() => Workflow.construct(Needs.create(), { cache: false })).toThrow(
      'Cannot construct workflow "Needs": missing required inputs x',
    );
  });

  it("only constructs workflow tasks", () => {
    expect(() => Workflow.construct(Add.create({ x: 1, y: 2 }))).toThrow(
      'Cannot construct "Add": it is a function task, not a workflow',
    );
  });

  it("reserves the constructor input", () => {
    expect(() =>
      defineWorkflow({ name: "Bad", inputs: { constructor: t.any }, build: () => undefined }),
    ).toThrow("is reserved");
  });
});

describe("workflow inputs", () => {
  it("keeps inputs as converted once", () => {
    const Scaled = defineWorkflow({
      name: "Scaled",
      inputs: { a: { type: t.int, converter: (v) => Number(v) * 10 } },
      build: ({ a }) => a,
    });
    const wf = Workflow.construct(Scaled.create({ a: 1 }), { cache: false });
    expect(wf.inputs.get("a")).toBe(10);
  });
});

describe("nested workflows", () => {
  const Inner = defineWorkflow({
    name: "Inner",
    inputs: { a: t.int },
    returns: t.int,
    build: ({ a }, wf) => wf.add(Add.create({ x: a, y: 10 })).lzout.out,
  });

  it("constructs the nested graph on first access", () => {
    const wf = construct((wf) => {
      const seed = wf.add(Seed.create());
      return wf.add(Inner.create({ a: seed.lzout.out })).lzout.out;
    });
    const node = wf.node("Inner");
    const nested = node.nestedWorkflow();

    expect(nested.name).toBe("Inner");
    expect(nested.nodeNames).toEqual(["Add"]);
    expect(nested.inputs.isLazy("a")).toBe(true);
    expect(node.nestedWorkflow()).toBe(nested);
    expect(node.dependsOn).toEqual(["seed"]);
  });

  it("has no nested graph for other tasks", () => {
    const wf = construct((wf) => wf.add(Add.create({ x: 1, y: 2 })).lzout.out);
    expect(() => wf.node("Add").nestedWorkflow()).toThrow(
      'Node "Add" runs function task "Add", which has no nested workflow',
    );
  });

  it("nests to any depth", () => {
    const Countdown: GraphTask<"out", "n"> = defineWorkflow({
      name: "Countdown",
      inputs: { n: t.int },
      build: ({ n }, wf) => {
        if (typeof n !== "number" || n === 0) return n;
        const node = wf.add(Countdown.create({ n: n - 1 }));
        node.nestedWorkflow();
        return node.lzout.out;
      },
    });
    const wf = Workflow.construct(Countdown.create({ n: 2 }), { cache: false });
    const innermost = wf.node("Countdown").nestedWorkflow().node("Countdown").nestedWorkflow();

    expect(innermost.nodeNames).toEqual([]);
    expect(innermost.outputs.get("out")).toBe(0);
  });

  it("rejects a workflow that contains itself", () => {
    const Loop: GraphTask<"out", "n"> = defineWorkflow({
      name: "Loop",
      inputs: { n: t.int },
      build: ({ n }, wf) => {
        const node = wf.add(Loop.create({ n }));
        node.nestedWorkflow();
        return node.lzout.out;
      },
    });
    expect(() => Workflow.construct(Loop.create({ n: 1 }), { cache: false })).toThrow(
      'Workflow "Loop" is already being constructed with the same inputs; a workflow cannot contain itself',
    );
    expect(() => Workflow.construct(Loop.create({ n: 1 }))).toThrow("a workflow cannot contain itself");
  });
});
