import { createHash } from "node:crypto";
import { getConfig } from "../config.js";
import { HashingError } from "../errors.js";
import { LazyField } from "../lazy/lazy-field.js";
import type { Field } from "../task/field.js";

/** Values that know their own content hash, e.g. content-addressable files. */
export interface ContentHashable {
  contentHash(): string;
}

export type InstanceHashes = {
  hash: string;
  fieldHashes: Record<string, string>;
};

function isContentHashable(value: object): value is ContentHashable {
  return "contentHash" in value && typeof value.contentHash === "function";
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function digest(data: string): string {
  const { algorithm, digestLength } = getConfig().hashing;
  const hex = createHash(algorithm).update(data).digest("hex");
  return digestLength > 0 ? hex.slice(0, digestLength) : hex;
}

const FUNCTION_HEADER = /^(async\s+)?function\b\s*(\*?)\s*[\w$]*\s*\(/;
const ARROW_HEADER = /^(async\s+)?(\(|[\w$]+\s*=>)/;
const METHOD_HEADER = /^(async\s+)?(\*?)\s*[\w$]+\s*\(/;

/**
 * Source text of a function with its own name removed and whitespace
 * collapsed, so that `function add(a) {...}`, `function (a) {...}` and the
 * method shorthand `add(a) {...}` normalize to the same text.
 */
export function normalizeSource(fn: Function): string {
  const src = fn.toString().trim();
  if (src.includes("[native code]")) {
    return `native ${fn.name}`;
  }
  let normalized = src;
  const fnMatch = FUNCTION_HEADER.exec(src);
  if (fnMatch) {
    normalized = `${fnMatch[1] ?? ""}function${fnMatch[2]}(${src.slice(fnMatch[0].length)}`;
  } else if (!ARROW_HEADER.test(src) && !src.startsWith("class")) {
    const methodMatch = METHOD_HEADER.exec(src);
    if (methodMatch) {
      normalized = `${methodMatch[1] ?? ""}function${methodMatch[2]}(${src.slice(methodMatch[0].length)}`;
    }
  }
  return normalized.replace(/\s+/g, " ");
}

function encode(value: unknown, stack: Set<object>): string {
  switch (typeof value) {
    case "undefined":
      return "u";
    case "boolean":
      return value ? "b:1" : "b:0";
    case "number":
      return Object.is(value, -0) ? "d:-0" : `d:${value}`;
    case "bigint":
      return `g:${value}`;
    case "string":
      return `s:${JSON.stringify(value)}`;
    case "symbol":
      throw new HashingError(`Cannot hash symbol ${String(value)}`);
    case "function":
      return `f:${normalizeSource(value)}`;
  }
  if (value === null) return "n";
  if (value instanceof LazyField) {
    throw new HashingError(`Cannot hash ${value.toString()}: its value is not known until the workflow runs`);
  }
  if (stack.has(value)) {
    throw new HashingError("Cannot hash a value that contains itself");
  }
  stack.add(value);
  try {
    return encodeObject(value, stack);
  } finally {
    stack.delete(value);
  }
}

function encodeObject(value: object, stack: Set<object>): string {
  if (isContentHashable(value)) {
    return `h:${value.contentHash()}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => encode(item, stack)).join(",")}]`;
  }
  if (value instanceof Date) {
    return `t:${value.getTime()}`;
  }
  if (ArrayBuffer.isView(value)) {
    return `x:${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64")}`;
  }
  if (value instanceof Map) {
    const entries = [...value.entries()].map(([k, v]) => `${encode(k, stack)}=>${encode(v, stack)}`);
    return `M{${entries.sort().join(",")}}`;
  }
  if (value instanceof Set) {
    const items = [...value].map((item) => encode(item, stack));
    return `S{${items.sort().join(",")}}`;
  }
  if (isPlainObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${encode(value[k], stack)}`).join(",")}}`;
  }
  const kind = value.constructor?.name ?? "object";
  throw new HashingError(
    `Cannot hash value of type ${kind}; give it a contentHash() method or declare the field with hash "by-equality"`,
  );
}

/** Structural content hash of a value. */
export function hashValue(value: unknown): string {
  return digest(encode(value, new Set()));
}

/** Hash of a function's normalized source; redefining an identical function keeps its hash. */
export function hashFunction(fn: Function): string {
  return digest(`f:${normalizeSource(fn)}`);
}

const identityTokens = new WeakMap<object, number>();
let nextToken = 0;

/**
 * Process-local token shared by equal values: primitives compare by value,
 * objects and functions by identity.
 */
export function equalityToken(value: unknown): string {
  if ((typeof value === "object" && value !== null) || typeof value === "function") {
    let token = identityTokens.get(value);
    if (token === undefined) {
      token = nextToken++;
      identityTokens.set(value, token);
    }
    return `ref:${token}`;
  }
  return `val:${encode(value, new Set())}`;
}

/** Hash of one field's value, honouring the field's hashing policy and type. */
export function hashField(field: Field, value: unknown): string {
  try {
    if (field.hash === "by-equality") {
      return digest(`e:${equalityToken(value)}`);
    }
    if (field.type.contentHash && value !== undefined && value !== null) {
      return digest(`c:${field.type.contentHash(value)}`);
    }
    return hashValue(value);
  } catch (err) {
    if (err instanceof HashingError) {
      throw new HashingError(`Cannot hash field "${field.name}": ${err.message}`);
    }
    throw err;
  }
}

/**
 * Hash of the sequence a field is split over. Each element hashes like a value
 * of the field; a lazy sequence is known only by its source.
 */
export function hashSplit(field: Field, split: readonly unknown[] | LazyField): string {
  if (split instanceof LazyField) {
    return digest(`sl:${split.toString()}`);
  }
  return digest(`sp:[${split.map((item) => hashField(field, item)).join(",")}]`);
}

/** Fold ordered per-field hashes into one. */
export function foldHashes(entries: ReadonlyArray<readonly [string, string]>): string {
  return digest(entries.map(([name, hash]) => `${name}=${hash}`).join(";"));
}

/**
 * Per-field and combined hashes of a set of field values, in field order.
 * `names` restricts the fields taken into account; a field in `splits` hashes
 * by its split sequence.
 */
export function computeHashes(
  fields: readonly Field[],
  values: Readonly<Record<string, unknown>>,
  names?: readonly string[],
  splits?: ReadonlyMap<string, readonly unknown[] | LazyField>,
): InstanceHashes {
  const selected = names ? fields.filter((f) => names.includes(f.name)) : fields;
  const entries = selected.map((f) => {
    const split = splits?.get(f.name);
    return [f.name, split === undefined ? hashField(f, values[f.name]) : hashSplit(f, split)] as const;
  });
  return {
    hash: foldHashes(entries),
    fieldHashes: Object.fromEntries(entries),
  };
}
