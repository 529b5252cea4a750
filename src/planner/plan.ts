import { ConstructionError } from "../errors.js";
import { isLazy, LazyInField, LazyOutField } from "../lazy/lazy-field.js";
import { describeState } from "../state/state.js";
import type { TaskKind } from "../task/spec.js";
import type { Workflow } from "../workflow/workflow.js";

export type PlannedNode = {
  name: string;
  task: string;
  kind: TaskKind;
  dependsOn: string[];
  /** Splitter terms; inherited ones are written "_<node>" */
  splitter: string[];
  combiner: string[];
  openAxes: string[];
  /** Task executions, unknown while a split sequence is lazy */
  executions?: number;
  /** Output elements after combining */
  cardinality?: number;
};

export type ExecutionPlan = {
  workflow: string;
  nodes: PlannedNode[];
  /** Source of each workflow output: "<node>.<field>", "inputs.<field>" or "value" */
  outputs: Record<string, string>;
};

/** Describe a constructed workflow for an execution backend. */
export function planWorkflow(wf: Workflow): ExecutionPlan {
  const nodes = wf.nodes.map((node): PlannedNode => {
    const { splitter, combiner, open } = describeState(node.state);
    return {
      name: node.name,
      task: node.task.name,
      kind: node.task.spec.kind,
      dependsOn: node.dependsOn,
      splitter,
      combiner,
      openAxes: open,
      executions: node.state.executions,
      cardinality: node.state.cardinality,
    };
  });

  const outputs: Record<string, string> = {};
  for (const field of wf.outputs.fields) {
    const value = wf.outputs.get(field.name);
    if (value instanceof LazyOutField) outputs[field.name] = `${value.node.name}.${value.field}`;
    else if (value instanceof LazyInField) outputs[field.name] = `inputs.${value.field}`;
    else outputs[field.name] = isLazy(value) ? value.toString() : "value";
  }

  const plan: ExecutionPlan = { workflow: wf.name, nodes, outputs };
  validate(plan);
  return plan;
}

/** Validate a plan: check for missing deps and cycles. */
export function validate(plan: ExecutionPlan): void {
  const names = new Set(plan.nodes.map((n) => n.name));

  for (const node of plan.nodes) {
    for (const dep of node.dependsOn) {
      if (!names.has(dep)) {
        throw new ConstructionError("UNKNOWN_NODE", `Node "${node.name}" depends on unknown node "${dep}"`, {
          node: node.name,
        });
      }
    }
    if (node.dependsOn.includes(node.name)) {
      throw new ConstructionError("FORWARD_REFERENCE", `Node "${node.name}" depends on itself`, { node: node.name });
    }
  }

  if (hasCycle(plan)) {
    throw new ConstructionError("FORWARD_REFERENCE", `Plan of workflow "${plan.workflow}" contains a cycle`);
  }
}

function dependentsOf(plan: ExecutionPlan): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const node of plan.nodes) {
    for (const dep of node.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(node.name);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/** Detect cycles using DFS with coloring. */
function hasCycle(plan: ExecutionPlan): boolean {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const node of plan.nodes) color.set(node.name, WHITE);
  const dependents = dependentsOf(plan);

  function dfs(name: string): boolean {
    color.set(name, GRAY);
    for (const next of dependents.get(name) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return true; // back edge = cycle
      if (c === WHITE && dfs(next)) return true;
    }
    color.set(name, BLACK);
    return false;
  }

  return plan.nodes.some((node) => color.get(node.name) === WHITE && dfs(node.name));
}

/** Return nodes in topological order (dependencies first). */
export function topologicalSort(plan: ExecutionPlan): PlannedNode[] {
  const byName = new Map(plan.nodes.map((n) => [n.name, n]));
  const visited = new Set<string>();
  const sorted: PlannedNode[] = [];

  function visit(node: PlannedNode): void {
    if (visited.has(node.name)) return;
    visited.add(node.name);
    for (const dep of node.dependsOn) {
      const upstream = byName.get(dep);
      if (upstream) visit(upstream);
    }
    sorted.push(node);
  }

  for (const node of plan.nodes) {
    visit(node);
  }
  return sorted;
}

/** Group nodes into layers; every node's dependencies sit in earlier layers. */
export function layers(plan: ExecutionPlan): string[][] {
  const depth = new Map<string, number>();
  for (const node of topologicalSort(plan)) {
    const level = Math.max(-1, ...node.dependsOn.map((dep) => depth.get(dep) ?? -1)) + 1;
    depth.set(node.name, level);
  }
  const result: string[][] = [];
  for (const node of plan.nodes) {
    const level = depth.get(node.name) ?? 0;
    while (result.length <= level) result.push([]);
    result[level].push(node.name);
  }
  return result;
}

/** Every node that transitively consumes the outputs of `name`, in visiting order. */
export function downstreamOf(plan: ExecutionPlan, name: string): string[] {
  const dependents = dependentsOf(plan);
  const queue = [...(dependents.get(name) ?? [])];
  const visited: string[] = [];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || visited.includes(next)) continue;
    visited.push(next);
    queue.push(...(dependents.get(next) ?? []));
  }
  return visited;
}
