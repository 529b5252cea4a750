/**
 * Field types describe what a field holds. The engine only relies on the
 * {@link FieldType} contract, so content-addressable types (files, images, ...)
 * can be supplied from outside with their own hashing and compatibility rules.
 */
export interface FieldType {
  readonly name: string;
  /** Whether a value of this type may flow into a field declared as `target`. */
  isCompatibleWith(target: FieldType): boolean;
  /** Runtime check applied to concrete values bound to a field of this type. */
  accepts?(value: unknown): boolean;
  /** Content hash of a value, replacing the engine's structural hash. */
  contentHash?(value: unknown): string;
  /** Renders a value as a single command-line argument. */
  toArgument?(value: unknown): string;
}

export function isFieldType(value: unknown): value is FieldType {
  if (typeof value !== "object" || value === null) return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "isCompatibleWith" in value &&
    typeof value.isCompatibleWith === "function"
  );
}

export class AnyType implements FieldType {
  readonly name = "any";

  isCompatibleWith(): boolean {
    return true;
  }

  accepts(): boolean {
    return true;
  }
}

export class PrimitiveType implements FieldType {
  constructor(
    readonly name: string,
    private readonly predicate: (value: unknown) => boolean,
    private readonly widensTo: readonly string[] = [],
  ) {}

  isCompatibleWith(target: FieldType): boolean {
    if (!(target instanceof PrimitiveType)) return false;
    return target.name === this.name || this.widensTo.includes(target.name);
  }

  accepts(value: unknown): boolean {
    return this.predicate(value);
  }
}

export class ListType implements FieldType {
  readonly name: string;

  constructor(readonly element: FieldType) {
    this.name = `list[${element.name}]`;
  }

  isCompatibleWith(target: FieldType): boolean {
    return target instanceof ListType && isCompatible(this.element, target.element);
  }

  accepts(value: unknown): boolean {
    if (!Array.isArray(value)) return false;
    const check = this.element.accepts?.bind(this.element);
    return check ? value.every((item) => check(item)) : true;
  }
}

export class TupleType implements FieldType {
  readonly name: string;

  constructor(readonly elements: readonly FieldType[]) {
    this.name = `tuple[${elements.map((e) => e.name).join(", ")}]`;
  }

  isCompatibleWith(target: FieldType): boolean {
    if (!(target instanceof TupleType) || target.elements.length !== this.elements.length) {
      return false;
    }
    return this.elements.every((el, i) => isCompatible(el, target.elements[i]));
  }

  accepts(value: unknown): boolean {
    if (!Array.isArray(value) || value.length !== this.elements.length) return false;
    return this.elements.every((el, i) => el.accepts?.(value[i]) ?? true);
  }
}

export class UnionType implements FieldType {
  readonly name: string;

  constructor(readonly members: readonly FieldType[]) {
    this.name = members.map((m) => m.name).join(" | ");
  }

  // Union handling lives in isCompatible(); this is only reached for leaf targets.
  isCompatibleWith(target: FieldType): boolean {
    return this.members.every((m) => isCompatible(m, target));
  }

  accepts(value: unknown): boolean {
    return this.members.some((m) => m.accepts?.(value) ?? true);
  }
}

/**
 * Compatibility between a producing and a consuming type. `any` matches
 * everything; a union source must be compatible member by member; a union
 * target accepts a source that fits one of its members.
 */
export function isCompatible(source: FieldType, target: FieldType): boolean {
  if (source instanceof AnyType || target instanceof AnyType) return true;
  if (source.name === target.name) return true;
  if (source instanceof UnionType) {
    return source.members.every((m) => isCompatible(m, target));
  }
  if (target instanceof UnionType) {
    return target.members.some((m) => isCompatible(source, m));
  }
  return source.isCompatibleWith(target);
}

/** Element type of a sequence type, `any` for `any`, otherwise undefined. */
export function elementTypeOf(type: FieldType): FieldType | undefined {
  if (type instanceof ListType) return type.element;
  if (type instanceof AnyType) return type;
  return undefined;
}

function flattenUnion(members: readonly FieldType[]): FieldType[] {
  const flat: FieldType[] = [];
  for (const member of members) {
    for (const m of member instanceof UnionType ? member.members : [member]) {
      if (!flat.some((existing) => existing.name === m.name)) flat.push(m);
    }
  }
  return flat;
}

const anyType: FieldType = new AnyType();
const int: FieldType = new PrimitiveType("int", (v) => typeof v === "number" && Number.isInteger(v), ["float"]);
const float: FieldType = new PrimitiveType("float", (v) => typeof v === "number");
const str: FieldType = new PrimitiveType("str", (v) => typeof v === "string");
const bool: FieldType = new PrimitiveType("bool", (v) => typeof v === "boolean");
const none: FieldType = new PrimitiveType("none", (v) => v === null || v === undefined);
const callable: FieldType = new PrimitiveType("callable", (v) => typeof v === "function");

function union(...members: FieldType[]): FieldType {
  const flat = flattenUnion(members);
  if (flat.some((m) => m instanceof AnyType)) return anyType;
  return flat.length === 1 ? flat[0] : new UnionType(flat);
}

/** Builtin field types. */
export const t = {
  any: anyType,
  int,
  float,
  str,
  bool,
  none,
  callable,
  list: (element: FieldType): FieldType => new ListType(element),
  tuple: (...elements: FieldType[]): FieldType => new TupleType(elements),
  union,
  optional: (inner: FieldType): FieldType => union(inner, none),
} as const;
