import { ConstructionError } from "../errors.js";

/** One replication axis: a split field of a node, named "<node>.<field>". */
export type Axis = {
  readonly name: string;
  readonly node: string;
  readonly field: string;
  /** Number of elements, unknown while the split sequence is lazy. */
  readonly size?: number;
};

/** An own axis name, or a reference to the open axes inherited from an upstream node. */
export type SplitterTerm = string | { readonly inherit: string };

export type UpstreamState = {
  node: string;
  openAxes: readonly Axis[];
};

export type StateInput = {
  node: string;
  own: ReadonlyArray<{ field: string; size?: number }>;
  /** Element-wise upstream bindings in input order; repeats are collapsed. */
  upstream: readonly UpstreamState[];
  combine: readonly string[];
};

export class NodeState {
  readonly node: string;
  readonly splitter: readonly SplitterTerm[];
  readonly combiner: readonly string[];
  /** Inherited axes first, then the node's own, in declaration order. */
  readonly axes: readonly Axis[];
  readonly openAxes: readonly Axis[];
  readonly combinedAxes: readonly Axis[];

  constructor(node: string, splitter: readonly SplitterTerm[], axes: readonly Axis[], combiner: readonly string[]) {
    this.node = node;
    this.splitter = splitter;
    this.axes = axes;
    this.combiner = combiner;
    this.combinedAxes = axes.filter((a) => combiner.includes(a.name));
    this.openAxes = axes.filter((a) => !combiner.includes(a.name));
  }

  get isSplit(): boolean {
    return this.axes.length > 0;
  }

  /** Number of task executions, or undefined while an axis size is unknown. */
  get executions(): number | undefined {
    return product(this.axes);
  }

  /** Number of output elements left after combining. */
  get cardinality(): number | undefined {
    return product(this.openAxes);
  }

  /** Open and combined axis names; two states with equal signatures are interchangeable downstream. */
  signature(): string {
    const open = this.openAxes.map((a) => a.name).join(",");
    const combined = this.combinedAxes.map((a) => a.name).join(",");
    return `${open}|${combined}`;
  }

  sameAs(other: NodeState): boolean {
    return this.signature() === other.signature();
  }

  /**
   * Index of every axis for each execution, in row-major order over
   * {@link axes} (the last axis varies fastest).
   */
  combinations(): Array<Record<string, number>> {
    let rows: Array<Record<string, number>> = [{}];
    for (const axis of this.axes) {
      if (axis.size === undefined) {
        throw new ConstructionError(
          "INVALID_SPLIT",
          `Cannot enumerate the state of node "${this.node}": the size of axis "${axis.name}" is not known yet`,
          { node: this.node, field: axis.field },
        );
      }
      const size = axis.size;
      rows = rows.flatMap((row) => Array.from({ length: size }, (_, i) => ({ ...row, [axis.name]: i })));
    }
    return rows;
  }
}

function product(axes: readonly Axis[]): number | undefined {
  let total = 1;
  for (const axis of axes) {
    if (axis.size === undefined) return undefined;
    total *= axis.size;
  }
  return total;
}

/** Resolve combiner names: short names refer to the node's own split fields. */
export function resolveCombiner(node: string, names: readonly string[], axes: readonly Axis[]): string[] {
  const resolved: string[] = [];
  for (const name of names) {
    const full = name.includes(".") ? name : `${node}.${name}`;
    if (!axes.some((a) => a.name === full)) {
      const available = axes.length > 0 ? axes.map((a) => a.name).join(", ") : "none";
      throw new ConstructionError(
        "INVALID_AXIS",
        `Cannot combine "${name}" on node "${node}": it is not an axis of the node's state (axes: ${available})`,
        { node },
      );
    }
    if (!resolved.includes(full)) resolved.push(full);
  }
  return resolved;
}

/**
 * Derive a node's state: the union of the open axes of every element-wise
 * upstream, followed by the node's own split axes, minus what it combines.
 */
export function deriveState(input: StateInput): NodeState {
  const splitter: SplitterTerm[] = [];
  const axes: Axis[] = [];

  for (const upstream of input.upstream) {
    if (upstream.openAxes.length === 0) continue;
    if (!splitter.some((term) => typeof term !== "string" && term.inherit === upstream.node)) {
      splitter.push({ inherit: upstream.node });
    }
    for (const axis of upstream.openAxes) {
      if (!axes.some((a) => a.name === axis.name)) axes.push(axis);
    }
  }

  for (const own of input.own) {
    const axis: Axis = { name: `${input.node}.${own.field}`, node: input.node, field: own.field, size: own.size };
    splitter.push(axis.name);
    axes.push(axis);
  }

  const combiner = resolveCombiner(input.node, input.combine, axes);
  return new NodeState(input.node, splitter, axes, combiner);
}

/** Plain rendering of a state, with inherited terms written as "_<node>". */
export function describeState(state: NodeState): { splitter: string[]; combiner: string[]; open: string[] } {
  return {
    splitter: state.splitter.map((term) => (typeof term === "string" ? term : `_${term.inherit}`)),
    combiner: [...state.combiner],
    open: state.openAxes.map((a) => a.name),
  };
}
