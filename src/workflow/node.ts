import { ConstructionError, StateError } from "../errors.js";
import { isLazy, LazyOutField } from "../lazy/lazy-field.js";
import { deriveState, describeState, type NodeState, type SplitterTerm, type UpstreamState } from "../state/state.js";
import { isGraphTask } from "../task/graph-task.js";
import type { TaskInstance } from "../task/spec.js";
import { t } from "../types/field-type.js";
import { log } from "../utils/logger.js";
import type { Workflow } from "./workflow.js";

/**
 * State of a node running `task`: element-wise lazy inputs pass their
 * producer's open axes on, aggregated ones do not.
 */
export function stateOf(name: string, task: TaskInstance): NodeState {
  const upstream: UpstreamState[] = [];
  for (const binding of task.lazyBindings()) {
    if (binding.mode === "aggregate") continue;
    upstream.push({ node: binding.lazy.producerName, openAxes: binding.lazy.openAxes() });
  }
  const own = [...task.splitFields].map(([field, value]) => ({
    field,
    size: isLazy(value) ? undefined : value.length,
  }));
  return deriveState({ node: name, own, upstream, combine: task.combinerNames });
}

function hasNames<K extends string, V>(record: Record<string, V>, names: readonly K[]): record is Record<K, V> {
  return names.every((name) => name in record);
}

/** A named vertex of a workflow, owning the task instance it runs. */
export class Node<O extends string = string> {
  readonly name: string;
  readonly workflow: Workflow;
  /** Position in the workflow; nodes only reference nodes with a lower index. */
  readonly index: number;
  private current: TaskInstance<O>;
  private currentState: NodeState;
  private isObserved = false;
  private nested?: Workflow;

  constructor(workflow: Workflow, name: string, index: number, task: TaskInstance<O>) {
    this.workflow = workflow;
    this.name = name;
    this.index = index;
    this.currentState = stateOf(name, task);
    task.consume(name);
    this.current = task;
  }

  get task(): TaskInstance<O> {
    return this.current;
  }

  get state(): NodeState {
    return this.currentState;
  }

  get splitter(): readonly SplitterTerm[] {
    return this.currentState.splitter;
  }

  get combiner(): readonly string[] {
    return this.currentState.combiner;
  }

  /** Whether a later node or the workflow outputs read this node's outputs. */
  get observed(): boolean {
    return this.isObserved;
  }

  /** @internal */
  markObserved(): void {
    this.isObserved = true;
  }

  get inputs(): Record<string, unknown> {
    return this.current.values();
  }

  /** Names of the nodes whose outputs feed this one, in input order. */
  get dependsOn(): string[] {
    const names: string[] = [];
    for (const binding of this.current.lazyBindings()) {
      if (binding.lazy instanceof LazyOutField && !names.includes(binding.lazy.node.name)) {
        names.push(binding.lazy.node.name);
      }
    }
    return names;
  }

  /**
   * Lazy references to every output. A node that combines produces lists,
   * so its outputs are typed `list[...]`.
   */
  get lzout(): Readonly<Record<O, LazyOutField>> {
    const refs: Record<string, LazyOutField> = Object.fromEntries(
      this.current.spec.outputFields.map((field) => [field.name, this.output(field.name)]),
    );
    const names = this.current.spec.outputNames;
    if (!hasNames(refs, names)) {
      throw new ConstructionError("UNKNOWN_OUTPUT", `Node "${this.name}" lacks outputs of ${names.join(", ")}`, {
        node: this.name,
      });
    }
    return Object.freeze(refs);
  }

  output(name: string): LazyOutField {
    const field = this.current.spec.outputField(name);
    if (!field) {
      const available = this.current.spec.outputFields.map((f) => f.name).join(", ");
      throw new ConstructionError("UNKNOWN_OUTPUT", `Node "${this.name}" has no output "${name}" (outputs: ${available})`, {
        node: this.name,
        field: name,
      });
    }
    const combined = this.currentState.combiner.length > 0;
    return new LazyOutField(this, name, combined ? t.list(field.type) : field.type);
  }

  /**
   * Rebind one input during construction. Once the node's outputs have been
   * read, the change must leave its state as it was.
   */
  setInput(name: string, value: unknown): this {
    this.workflow.assertOpen(`set input "${name}" of node "${this.name}"`);
    const candidate = this.current.copy();
    candidate.set(name, value);
    this.workflow.checkReferences(candidate, this.name, this.index);
    const state = stateOf(this.name, candidate);
    if (this.isObserved && !state.sameAs(this.currentState)) {
      const before = describeState(this.currentState).open.join(", ") || "none";
      const after = describeState(state).open.join(", ") || "none";
      throw new StateError(
        "STATE_LOCKED",
        `Outputs of node "${this.name}" have already been accessed and therefore cannot set input "${name}": its open axes would change from (${before}) to (${after})`,
        { node: this.name, field: name },
      );
    }
    candidate.consume(this.name);
    this.current = candidate;
    this.currentState = state;
    this.nested = undefined;
    this.workflow.observeUpstream(candidate);
    log.debug("Node input set", { workflow: this.workflow.name, node: this.name, field: name });
    return this;
  }

  /** The sub-workflow of a workflow-backed node, constructed on first access. */
  nestedWorkflow(): Workflow {
    if (!isGraphTask(this.current.spec)) {
      throw new ConstructionError(
        "INVALID_VALUE",
        `Node "${this.name}" runs ${this.current.spec.kind} task "${this.current.spec.name}", which has no nested workflow`,
        { node: this.name },
      );
    }
    this.nested ??= this.workflow.constructNested(this);
    return this.nested;
  }
}
