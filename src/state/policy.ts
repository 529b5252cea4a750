import type { AbsorbPolicy } from "../config.js";
import { ConstructionError } from "../errors.js";
import type { LazyField } from "../lazy/lazy-field.js";
import type { Field } from "../task/field.js";
import { elementTypeOf, isCompatible, ListType, type FieldType } from "../types/field-type.js";

/**
 * How a lazy input is consumed: `element` runs the consumer once per element
 * of the producer's open axes (inheriting them); `aggregate` hands the
 * consumer every element at once as a list, ending those axes.
 */
export type BindingMode = "element" | "aggregate";

export type ResolvedBinding = {
  lazy: LazyField;
  mode: BindingMode;
};

/**
 * Whether a consumer field absorbs the producer's open axes as one list.
 * Only a field declared as `list[E]`, fed by a value of type `E` from a
 * producer that still has open axes, can absorb, and only under `absorb`.
 */
export function shouldAbsorb(
  producedType: FieldType,
  consumerType: FieldType,
  producerOpenAxes: number,
  policy: AbsorbPolicy,
): boolean {
  if (policy !== "absorb" || producerOpenAxes === 0) return false;
  if (!(consumerType instanceof ListType)) return false;
  return isCompatible(producedType, consumerType.element);
}

/** Type-check a lazy value bound to a field and decide how its axes are consumed. */
export function resolveBinding(owner: string, field: Field, lazy: LazyField, policy: AbsorbPolicy): ResolvedBinding {
  if (isCompatible(lazy.type, field.type)) {
    return { lazy: lazy.checked(), mode: "element" };
  }
  if (shouldAbsorb(lazy.type, field.type, lazy.openAxes().length, policy)) {
    return { lazy: lazy.checked(), mode: "aggregate" };
  }
  throw new ConstructionError(
    "TYPE_MISMATCH",
    `Cannot bind ${lazy.toString()} of type ${lazy.type.name} to input "${field.name}" of ${owner}, which expects ${field.type.name}`,
    { node: owner, field: field.name },
  );
}

/** Type-check a lazy sequence a field is split over; its elements must fit the field. */
export function resolveSplitBinding(owner: string, field: Field, lazy: LazyField): ResolvedBinding {
  const element = elementTypeOf(lazy.type);
  if (!element) {
    throw new ConstructionError(
      "INVALID_SPLIT",
      `Cannot split input "${field.name}" of ${owner} over ${lazy.toString()}: ${lazy.type.name} is not a sequence`,
      { node: owner, field: field.name },
    );
  }
  if (!isCompatible(element, field.type)) {
    throw new ConstructionError(
      "TYPE_MISMATCH",
      `Cannot split input "${field.name}" of ${owner} over ${lazy.toString()}: elements of type ${element.name} do not fit ${field.type.name}`,
      { node: owner, field: field.name },
    );
  }
  return { lazy: lazy.checked(), mode: "element" };
}
