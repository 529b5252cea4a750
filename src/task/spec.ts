import { getConfig } from "../config.js";
import { ConstructionError, DefinitionError } from "../errors.js";
import { computeHashes, type InstanceHashes } from "../hash/hash.js";
import { isLazy, type LazyField } from "../lazy/lazy-field.js";
import { resolveBinding, resolveSplitBinding, type BindingMode } from "../state/policy.js";
import { assertUniqueNames, isRequired, type Field } from "./field.js";

export type TaskKind = "function" | "process" | "graph";

/** A lazy input of a task instance, with the way its producer's axes are consumed. */
export type LazyBinding = {
  field: string;
  lazy: LazyField;
  mode: BindingMode;
  /** The field is split over this lazy sequence. */
  split: boolean;
};

export type SplitValue = readonly unknown[] | LazyField;

/**
 * Schema of a unit of work: ordered input fields and ordered output fields.
 * Specifications are templates; {@link TaskSpec.create} binds values to them.
 */
export abstract class TaskSpec<O extends string = string> {
  abstract readonly kind: TaskKind;
  readonly name: string;
  readonly inputFields: readonly Field[];
  readonly outputFields: readonly Field[];
  readonly outputNames: readonly O[];

  protected constructor(name: string, inputFields: readonly Field[], outputFields: readonly Field[], outputNames: readonly O[]) {
    if (!name) {
      throw new DefinitionError("INVALID_DECLARATION", "A task needs a name; pass `name` or use a named function");
    }
    assertUniqueNames(inputFields, name, "input");
    assertUniqueNames(outputFields, name, "output");
    this.name = name;
    this.inputFields = Object.freeze([...inputFields]);
    this.outputFields = Object.freeze([...outputFields]);
    this.outputNames = Object.freeze([...outputNames]);
  }

  inputField(name: string): Field | undefined {
    return this.inputFields.find((f) => f.name === name);
  }

  outputField(name: string): Field | undefined {
    return this.outputFields.find((f) => f.name === name);
  }

  /** Bind values (concrete or lazy) to the inputs; unset fields keep their defaults. */
  create(values: Readonly<Record<string, unknown>> = {}): TaskInstance<O> {
    const instance = new TaskInstance<O>(this);
    for (const [name, value] of Object.entries(values)) {
      instance.set(name, value);
    }
    return instance;
  }

  computeHashes(
    values: Readonly<Record<string, unknown>>,
    names?: readonly string[],
    splits?: ReadonlyMap<string, SplitValue>,
  ): InstanceHashes {
    return computeHashes(this.inputFields, values, names, splits);
  }

  /** Bind what the task produced (return value, process result, ...) to its output fields. */
  abstract outputsFrom(values: Readonly<Record<string, unknown>>, produced: unknown): Record<string, unknown>;
}

/**
 * A task specification with values bound to its inputs. An instance belongs
 * to its creator until a node consumes it; after that it only changes
 * through the node.
 */
export class TaskInstance<O extends string = string> {
  readonly spec: TaskSpec<O>;
  private readonly bound = new Map<string, unknown>();
  private readonly explicit = new Set<string>();
  private readonly modes = new Map<string, BindingMode>();
  private readonly splits = new Map<string, SplitValue>();
  private combineNames: string[] = [];
  private owner?: string;

  constructor(spec: TaskSpec<O>) {
    this.spec = spec;
    for (const field of spec.inputFields) {
      if (field.hasDefault) this.bound.set(field.name, field.default);
    }
  }

  get name(): string {
    return this.spec.name;
  }

  /** Name of the node that consumed this instance, if any. */
  get consumedBy(): string | undefined {
    return this.owner;
  }

  get(name: string): unknown {
    this.field(name);
    return this.bound.get(name);
  }

  set(name: string, value: unknown): this {
    this.assertOwned(`set input "${name}"`);
    this.assign(name, value);
    return this;
  }

  /**
   * Bind a value without the ownership check. Lazy values are type-checked and
   * stored as checked copies; concrete values are converted and validated.
   * @internal Used by nodes, which own the instance after consuming it.
   */
  assign(name: string, value: unknown): void {
    const field = this.field(name);
    if (this.splits.has(name)) {
      throw new ConstructionError(
        "INVALID_SPLIT",
        `Input "${name}" of ${this.describe()} is split and cannot also be set`,
        { node: this.owner, field: name },
      );
    }
    if (value === undefined) {
      this.explicit.delete(name);
      this.modes.delete(name);
      if (field.hasDefault) this.bound.set(name, field.default);
      else this.bound.delete(name);
      return;
    }
    if (isLazy(value)) {
      const binding = resolveBinding(this.describe(), field, value, getConfig().state.absorbPolicy);
      this.bound.set(name, binding.lazy);
      this.modes.set(name, binding.mode);
    } else {
      const converted = field.converter ? field.converter(value) : value;
      if (field.type.accepts && !field.type.accepts(converted)) {
        throw new ConstructionError(
          "INVALID_VALUE",
          `Value for input "${name}" of ${this.describe()} does not match type ${field.type.name}`,
          { node: this.owner, field: name },
        );
      }
      this.bound.set(name, converted);
      this.modes.delete(name);
    }
    this.explicit.add(name);
  }

  /** Replicate the task over the elements of each given sequence (Cartesian product). */
  split(values: Readonly<Record<string, SplitValue>>): this {
    this.assertOwned("split");
    if (this.splits.size > 0) {
      throw new ConstructionError("INVALID_SPLIT", `${this.describe()} is already split`, { node: this.owner });
    }
    const entries = Object.entries(values);
    if (entries.length === 0) {
      throw new ConstructionError("INVALID_SPLIT", `Split of ${this.describe()} names no inputs`, { node: this.owner });
    }
    for (const [name, value] of entries) {
      this.assignSplit(name, value);
    }
    return this;
  }

  /** Regather the named axes into ordered lists once the split elements have run. */
  combine(...names: string[]): this {
    this.assertOwned("combine");
    if (names.length === 0) {
      throw new ConstructionError("INVALID_AXIS", `Combine of ${this.describe()} names no axes`, { node: this.owner });
    }
    this.combineNames = [...names];
    return this;
  }

  get splitFields(): ReadonlyMap<string, SplitValue> {
    return this.splits;
  }

  get combinerNames(): readonly string[] {
    return this.combineNames;
  }

  isLazy(name: string): boolean {
    return isLazy(this.bound.get(name));
  }

  /** Fields whose values are not known at construction: lazy values and split fields. */
  lazyFieldNames(): string[] {
    return this.spec.inputFields
      .filter((f) => this.splits.has(f.name) || this.isLazy(f.name))
      .map((f) => f.name);
  }

  concreteFieldNames(): string[] {
    return this.spec.inputFields
      .filter((f) => !this.splits.has(f.name) && !this.isLazy(f.name))
      .map((f) => f.name);
  }

  /** Every lazy value bound to an input or split over, in input order. */
  lazyBindings(): LazyBinding[] {
    const bindings: LazyBinding[] = [];
    for (const field of this.spec.inputFields) {
      const split = this.splits.get(field.name);
      if (split !== undefined) {
        if (isLazy(split)) bindings.push({ field: field.name, lazy: split, mode: "element", split: true });
        continue;
      }
      const value = this.bound.get(field.name);
      if (isLazy(value)) {
        bindings.push({ field: field.name, lazy: value, mode: this.modes.get(field.name) ?? "element", split: false });
      }
    }
    return bindings;
  }

  /** Required inputs that have neither a value nor a split. */
  missingRequired(): string[] {
    return this.spec.inputFields
      .filter((f) => isRequired(f) && !this.bound.has(f.name) && !this.splits.has(f.name))
      .map((f) => f.name);
  }

  /** Plain copy of the bound values (split fields excluded). */
  values(): Record<string, unknown> {
    return Object.fromEntries(this.bound);
  }

  /** Hashes of the bound values, with split fields hashed by their sequences. */
  computeHashes(names?: readonly string[]): InstanceHashes {
    return this.spec.computeHashes(this.values(), names, this.splits);
  }

  get hash(): string {
    return this.computeHashes().hash;
  }

  /**
   * An unconsumed copy. Concrete values are taken as already converted; lazy
   * bindings are resolved again under the current absorb policy.
   */
  copy(): TaskInstance<O> {
    const clone = new TaskInstance<O>(this.spec);
    const policy = getConfig().state.absorbPolicy;
    for (const [name, value] of this.bound) {
      if (isLazy(value)) {
        const binding = resolveBinding(clone.describe(), this.field(name), value, policy);
        clone.bound.set(name, binding.lazy);
        clone.modes.set(name, binding.mode);
      } else {
        clone.bound.set(name, value);
      }
    }
    for (const name of this.explicit) clone.explicit.add(name);
    for (const [name, value] of this.splits) {
      clone.splits.set(name, isLazy(value) ? resolveSplitBinding(clone.describe(), this.field(name), value).lazy : value);
    }
    clone.combineNames = [...this.combineNames];
    return clone;
  }

  /** @internal Mark the instance as owned by a node. */
  consume(owner: string): void {
    this.owner = owner;
  }

  private assignSplit(name: string, value: SplitValue): void {
    const field = this.field(name);
    if (this.explicit.has(name)) {
      throw new ConstructionError(
        "INVALID_SPLIT",
        `Input "${name}" of ${this.describe()} already has a value and cannot also be split`,
        { node: this.owner, field: name },
      );
    }
    if (isLazy(value)) {
      this.splits.set(name, resolveSplitBinding(this.describe(), field, value).lazy);
      return;
    }
    if (!Array.isArray(value)) {
      throw new ConstructionError(
        "INVALID_SPLIT",
        `Cannot split input "${name}" of ${this.describe()}: expected a sequence`,
        { node: this.owner, field: name },
      );
    }
    const elements = value.map((item) => (field.converter ? field.converter(item) : item));
    const check = field.type.accepts?.bind(field.type);
    if (check && !elements.every((item) => check(item))) {
      throw new ConstructionError(
        "INVALID_VALUE",
        `Elements split over input "${name}" of ${this.describe()} do not match type ${field.type.name}`,
        { node: this.owner, field: name },
      );
    }
    this.splits.set(name, Object.freeze(elements));
  }

  private field(name: string): Field {
    const field = this.spec.inputField(name);
    if (!field) {
      throw new DefinitionError(
        "UNRECOGNISED_INPUT",
        `"${this.spec.name}" has no input named "${name}" (inputs: ${this.spec.inputFields.map((f) => f.name).join(", ")})`,
      );
    }
    return field;
  }

  private assertOwned(action: string): void {
    if (this.owner !== undefined) {
      throw new ConstructionError(
        "SEALED",
        `Cannot ${action} on a task instance owned by node "${this.owner}"; use the node instead`,
        { node: this.owner },
      );
    }
  }

  private describe(): string {
    return this.owner ? `node "${this.owner}"` : `"${this.spec.name}"`;
  }
}
