import { getConfig } from "../config.js";
import { ConstructionError } from "../errors.js";
import { isLazy, LazyInField, LazyOutField, type LazyField } from "../lazy/lazy-field.js";
import { NodeNameSchema, parseOrThrow } from "../schemas.js";
import { describeState } from "../state/state.js";
import type { Field } from "../task/field.js";
import { CONSTRUCTOR_FIELD, isGraphTask, type GraphTask } from "../task/graph-task.js";
import { splitReturnValue } from "../task/outputs.js";
import type { TaskInstance, TaskSpec } from "../task/spec.js";
import { isCompatible, t } from "../types/field-type.js";
import { log } from "../utils/logger.js";
import { constructionKey, defaultConstructionCache, type ConstructionCache } from "./construction-cache.js";
import { Node } from "./node.js";

export type AddOptions = {
  /** Node name; derived from the task name when omitted */
  name?: string;
};

export type ConstructOptions = {
  /**
   * Cache to memoize the construction in, or `false` to always build a new
   * graph. Defaults to the shared cache while `cache.enabled` is set.
   */
  cache?: ConstructionCache | false;
};

// Constructions under way, per specification; a repeat is a graph that contains itself.
const inFlight = new Map<TaskSpec, Set<string>>();

/** Values bound to a workflow's outputs. */
export class WorkflowOutputs {
  private readonly owner: Workflow;
  private readonly bound = new Map<string, unknown>();

  constructor(owner: Workflow) {
    this.owner = owner;
  }

  get fields(): readonly Field[] {
    return this.owner.spec.outputFields;
  }

  set(name: string, value: unknown): void {
    this.owner.assertOpen(`set output "${name}"`);
    const field = this.owner.spec.outputField(name);
    if (!field) {
      throw new ConstructionError(
        "OUTPUT_BINDING",
        `Workflow "${this.owner.name}" has no output "${name}" (outputs: ${this.fields.map((f) => f.name).join(", ")})`,
        { field: name },
      );
    }
    if (this.bound.has(name)) {
      throw new ConstructionError("OUTPUT_BINDING", `Output "${name}" of workflow "${this.owner.name}" is already bound`, {
        field: name,
      });
    }
    this.bound.set(name, this.owner.bindOutput(field, value));
  }

  get(name: string): unknown {
    return this.bound.get(name);
  }

  has(name: string): boolean {
    return this.bound.has(name);
  }

  /** Output names not bound yet, in declaration order. */
  unbound(): string[] {
    return this.fields.filter((f) => !this.bound.has(f.name)).map((f) => f.name);
  }

  values(): Record<string, unknown> {
    return Object.fromEntries(this.bound);
  }
}

/**
 * A constructed graph of nodes. Workflows are only created through
 * {@link Workflow.construct}, which runs the graph task's constructor and
 * seals the result.
 */
export class Workflow {
  readonly name: string;
  readonly spec: GraphTask;
  /** Copy of the instance the workflow was constructed from. */
  readonly inputs: TaskInstance;
  readonly outputs: WorkflowOutputs;
  readonly cache: ConstructionCache | false;
  private readonly nodeList: Node[] = [];
  private sealed = false;

  private constructor(spec: GraphTask, inputs: TaskInstance, cache: ConstructionCache | false) {
    this.name = spec.name;
    this.spec = spec;
    this.inputs = inputs;
    this.cache = cache;
    this.outputs = new WorkflowOutputs(this);
  }

  /**
   * Build the graph of a workflow task instance, or return the cached graph
   * of an equivalent earlier construction.
   */
  static construct(instance: TaskInstance, options: ConstructOptions = {}): Workflow {
    const spec = instance.spec;
    if (!isGraphTask(spec)) {
      throw new ConstructionError(
        "INVALID_VALUE",
        `Cannot construct "${spec.name}": it is a ${spec.kind} task, not a workflow`,
      );
    }
    const missing = instance.missingRequired();
    if (missing.length > 0) {
      throw new ConstructionError(
        "MISSING_INPUT",
        `Cannot construct workflow "${spec.name}": missing required inputs ${missing.join(", ")}`,
      );
    }

    const cache = options.cache ?? (getConfig().cache.enabled ? defaultConstructionCache : false);
    if (cache) {
      const hit = cache.lookup(instance);
      if (hit) return hit;
    }

    const { names, hash } = constructionKey(instance);
    const key = `${names.join(",")}#${hash}`;
    let running = inFlight.get(spec);
    if (!running) {
      running = new Set<string>();
      inFlight.set(spec, running);
    }
    if (running.has(key)) {
      throw new ConstructionError(
        "RECURSIVE_CONSTRUCTION",
        `Workflow "${spec.name}" is already being constructed with the same inputs; a workflow cannot contain itself`,
      );
    }
    running.add(key);
    try {
      const wf = Workflow.build(spec, instance, cache);
      if (cache) cache.store(instance, wf);
      return wf;
    } finally {
      running.delete(key);
      if (running.size === 0) inFlight.delete(spec);
    }
  }

  private static build(spec: GraphTask, instance: TaskInstance, cache: ConstructionCache | false): Workflow {
    const wf = new Workflow(spec, instance.copy(), cache);
    const lazy = instance.lazyFieldNames();
    const inputs: Record<string, unknown> = {};
    for (const field of spec.inputFields) {
      if (field.name === CONSTRUCTOR_FIELD) continue;
      inputs[field.name] = lazy.includes(field.name)
        ? new LazyInField(wf, field.name, field.type)
        : instance.get(field.name);
    }
    const build = instance.get(CONSTRUCTOR_FIELD);
    if (typeof build !== "function") {
      throw new ConstructionError("INVALID_VALUE", `Input "${CONSTRUCTOR_FIELD}" of "${spec.name}" is not callable`, {
        field: CONSTRUCTOR_FIELD,
      });
    }

    log.debug("Constructing workflow", { workflow: spec.name, lazy });
    const returned: unknown = Reflect.apply(build, undefined, [Object.freeze(inputs), wf]);
    wf.bindReturned(returned);
    wf.sealed = true;
    log.debug("Constructed workflow", { workflow: spec.name, nodes: wf.nodeNames });
    return wf;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get nodes(): readonly Node[] {
    return [...this.nodeList];
  }

  get nodeNames(): string[] {
    return this.nodeList.map((n) => n.name);
  }

  hasNode(name: string): boolean {
    return this.nodeList.some((n) => n.name === name);
  }

  node(name: string): Node {
    const node = this.nodeList.find((n) => n.name === name);
    if (!node) {
      throw new ConstructionError(
        "UNKNOWN_NODE",
        `Workflow "${this.name}" has no node "${name}" (nodes: ${this.nodeNames.join(", ") || "none"})`,
        { node: name },
      );
    }
    return node;
  }

  /**
   * Add a task instance as a node. The instance is consumed: later changes go
   * through the returned node.
   */
  add<O extends string>(instance: TaskInstance<O>, options: AddOptions = {}): Node<O> {
    this.assertOpen(`add "${instance.name}"`);
    if (instance.consumedBy !== undefined) {
      throw new ConstructionError(
        "DUPLICATE_NODE",
        `This "${instance.name}" instance already runs as node "${instance.consumedBy}"; add a copy() instead`,
        { node: instance.consumedBy },
      );
    }
    const name = this.nodeName(instance, options.name);
    const missing = instance.missingRequired();
    if (missing.length > 0) {
      throw new ConstructionError("MISSING_INPUT", `Node "${name}" is missing required inputs: ${missing.join(", ")}`, {
        node: name,
      });
    }
    const index = this.nodeList.length;
    this.checkReferences(instance, name, index);
    const node = new Node(this, name, index, instance);
    this.observeUpstream(instance);
    this.nodeList.push(node);

    const { splitter, combiner } = describeState(node.state);
    log.debug("Added node", { workflow: this.name, node: name, task: instance.name, splitter, combiner });
    return node;
  }

  /** @internal */
  assertOpen(action: string): void {
    if (this.sealed) {
      throw new ConstructionError("SEALED", `Workflow "${this.name}" is already constructed; cannot ${action}`);
    }
  }

  /**
   * Every lazy input of `task` must come from this workflow's inputs or from
   * a node added before position `index`.
   * @internal
   */
  checkReferences(task: TaskInstance, consumer: string, index: number): void {
    for (const binding of task.lazyBindings()) {
      this.checkReference(binding.lazy, index, `Input "${binding.field}" of node "${consumer}"`);
    }
  }

  /** @internal */
  observeUpstream(task: TaskInstance): void {
    for (const binding of task.lazyBindings()) {
      if (binding.lazy instanceof LazyOutField) binding.lazy.node.markObserved();
    }
  }

  /** @internal */
  constructNested(node: Node): Workflow {
    return Workflow.construct(node.task, { cache: this.cache });
  }

  /**
   * Type-check a value bound to a workflow output. Outputs of a node with
   * open axes are gathered into a list.
   * @internal
   */
  bindOutput(field: Field, value: unknown): unknown {
    if (!isLazy(value)) {
      if (field.type.accepts && !field.type.accepts(value)) {
        throw new ConstructionError(
          "TYPE_MISMATCH",
          `Value bound to output "${field.name}" of workflow "${this.name}" does not match type ${field.type.name}`,
          { field: field.name },
        );
      }
      return value;
    }
    this.checkReference(value, this.nodeList.length, `Output "${field.name}" of workflow "${this.name}"`);
    let type = value.type;
    if (value instanceof LazyOutField) {
      value.node.markObserved();
      if (value.openAxes().length > 0) type = t.list(type);
    }
    if (!isCompatible(type, field.type)) {
      throw new ConstructionError(
        "TYPE_MISMATCH",
        `Cannot bind ${value.toString()} of type ${type.name} to output "${field.name}" of workflow "${this.name}", which expects ${field.type.name}`,
        { field: field.name },
      );
    }
    return value.checked(type);
  }

  private bindReturned(returned: unknown): void {
    if (returned !== undefined) {
      const values = splitReturnValue(this.spec.outputFields, returned, this.name);
      for (const [name, value] of Object.entries(values)) {
        this.outputs.set(name, value);
      }
    }
    const unbound = this.outputs.unbound();
    if (unbound.length > 0) {
      throw new ConstructionError(
        "OUTPUT_BINDING",
        `Workflow "${this.name}" did not bind outputs ${unbound.join(", ")}; return them from the constructor or set them on wf.outputs`,
      );
    }
  }

  private checkReference(lazy: LazyField, index: number, target: string): void {
    if (lazy instanceof LazyInField) {
      if (lazy.workflow !== this) {
        throw new ConstructionError(
          "UNKNOWN_NODE",
          `${target} refers to ${lazy.toString()}, an input of another workflow than "${this.name}"`,
          { field: lazy.field },
        );
      }
      return;
    }
    if (lazy instanceof LazyOutField) {
      const producer = lazy.node;
      if (producer.workflow !== this || this.nodeList[producer.index] !== producer) {
        throw new ConstructionError(
          "UNKNOWN_NODE",
          `${target} refers to node "${producer.name}", which is not part of workflow "${this.name}"`,
          { node: producer.name },
        );
      }
      if (producer.index >= index) {
        throw new ConstructionError(
          "FORWARD_REFERENCE",
          `${target} refers to node "${producer.name}", which does not come before it`,
          { node: producer.name },
        );
      }
    }
  }

  private nodeName(instance: TaskInstance, explicit: string | undefined): string {
    if (explicit !== undefined) {
      parseOrThrow(NodeNameSchema, explicit, `node name "${explicit}"`);
      if (this.hasNode(explicit)) {
        throw new ConstructionError("DUPLICATE_NODE", `Workflow "${this.name}" already has a node named "${explicit}"`, {
          node: explicit,
        });
      }
      return explicit;
    }
    const base = instance.name.replace(/[^A-Za-z0-9_$]/g, "_");
    if (!this.hasNode(base)) return base;
    const { separator } = getConfig().naming;
    let i = 2;
    while (this.hasNode(`${base}${separator}${i}`)) i++;
    return `${base}${separator}${i}`;
  }
}
