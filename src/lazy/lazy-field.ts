import { ConstructionError } from "../errors.js";
import type { Axis } from "../state/state.js";
import type { FieldType } from "../types/field-type.js";
import type { Node } from "../workflow/node.js";
import type { Workflow } from "../workflow/workflow.js";

/**
 * Placeholder for a value that does not exist yet. Lazy fields carry no
 * value; they only name the entity that will produce it.
 */
export abstract class LazyField {
  constructor(
    readonly field: string,
    readonly type: FieldType,
    readonly typeChecked: boolean = false,
  ) {}

  /** Name of the workflow or node that produces the value. */
  abstract get producerName(): string;

  /** Open replication axes of the producer, inherited by element-wise consumers. */
  abstract openAxes(): readonly Axis[];

  /** Copy stamped as type-checked. */
  abstract checked(type?: FieldType): LazyField;

  abstract equals(other: unknown): boolean;

  toString(): string {
    return `lazy(${this.producerName}.${this.field})`;
  }

  [Symbol.toPrimitive](hint: "number" | "string" | "default"): string {
    if (hint === "string") return this.toString();
    throw new ConstructionError(
      "INVALID_VALUE",
      `${this.toString()} has no value during construction; only concrete inputs can be used in conditions or arithmetic`,
      { field: this.field },
    );
  }
}

/** Reference to one of a workflow's own inputs. */
export class LazyInField extends LazyField {
  constructor(
    readonly workflow: Workflow,
    field: string,
    type: FieldType,
    typeChecked = false,
  ) {
    super(field, type, typeChecked);
  }

  get producerName(): string {
    return this.workflow.name;
  }

  openAxes(): readonly Axis[] {
    return [];
  }

  checked(type: FieldType = this.type): LazyInField {
    return new LazyInField(this.workflow, this.field, type, true);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LazyInField &&
      other.workflow === this.workflow &&
      other.field === this.field &&
      other.type.name === this.type.name &&
      other.typeChecked === this.typeChecked
    );
  }
}

/** Reference to an output of a node that has not run yet. */
export class LazyOutField extends LazyField {
  constructor(
    readonly node: Node,
    field: string,
    type: FieldType,
    typeChecked = false,
  ) {
    super(field, type, typeChecked);
  }

  get producerName(): string {
    return this.node.name;
  }

  openAxes(): readonly Axis[] {
    return this.node.state.openAxes;
  }

  checked(type: FieldType = this.type): LazyOutField {
    return new LazyOutField(this.node, this.field, type, true);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LazyOutField &&
      other.node === this.node &&
      other.field === this.field &&
      other.type.name === this.type.name &&
      other.typeChecked === this.typeChecked
    );
  }
}

export function isLazy(value: unknown): value is LazyField {
  return value instanceof LazyField;
}
