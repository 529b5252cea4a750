import { DefinitionError } from "../errors.js";
import { IdentifierSchema, InputFieldOptionsSchema, OutputFieldOptionsSchema, parseOrThrow } from "../schemas.js";
import { isFieldType, t, type FieldType } from "../types/field-type.js";

export type HashPolicy = "by-value" | "by-equality";

export type Converter = (value: unknown) => unknown;

export type InputFieldOptions = {
  type?: FieldType;
  default?: unknown;
  optional?: boolean;
  converter?: Converter;
  hash?: HashPolicy;
  help?: string;
  /** Flag placed before the value on a command line. */
  argstr?: string;
  /** Command-line position; negative positions count from the end. */
  position?: number;
};

export type OutputFieldOptions = {
  type?: FieldType;
  help?: string;
  /** Output path of a process task, with `{input}` placeholders. */
  pathTemplate?: string;
  argstr?: string;
  position?: number;
};

export type InputDeclaration = Readonly<Record<string, FieldType | InputFieldOptions>>;

/** A named input or output of a task. Frozen once declared. */
export type Field = Readonly<{
  name: string;
  type: FieldType;
  hasDefault: boolean;
  default?: unknown;
  optional: boolean;
  converter?: Converter;
  hash: HashPolicy;
  help?: string;
  argstr?: string;
  position?: number;
  pathTemplate?: string;
}>;

export function isRequired(field: Field): boolean {
  return !field.optional && !field.hasDefault;
}

export function makeInputField(name: string, decl: FieldType | InputFieldOptions = t.any): Field {
  parseOrThrow(IdentifierSchema, name, `input name "${name}"`);
  if (isFieldType(decl)) {
    const field: Field = { name, type: decl, hasDefault: false, optional: false, hash: "by-value" };
    return Object.freeze(field);
  }
  parseOrThrow(InputFieldOptionsSchema, decl, `options of input "${name}"`);
  const hasDefault = "default" in decl;
  const field: Field = {
    name,
    type: decl.optional && decl.type ? t.optional(decl.type) : decl.type ?? t.any,
    hasDefault,
    default: hasDefault && decl.converter ? decl.converter(decl.default) : decl.default,
    optional: decl.optional ?? false,
    converter: decl.converter,
    hash: decl.hash ?? "by-value",
    help: decl.help,
    argstr: decl.argstr,
    position: decl.position,
  };
  return Object.freeze(field);
}

export function makeOutputField(name: string, decl: FieldType | OutputFieldOptions = t.any): Field {
  parseOrThrow(IdentifierSchema, name, `output name "${name}"`);
  if (isFieldType(decl)) {
    const field: Field = { name, type: decl, hasDefault: false, optional: false, hash: "by-value" };
    return Object.freeze(field);
  }
  parseOrThrow(OutputFieldOptionsSchema, decl, `options of output "${name}"`);
  const field: Field = {
    name,
    type: decl.type ?? t.any,
    hasDefault: false,
    optional: false,
    hash: "by-value",
    help: decl.help,
    argstr: decl.argstr,
    position: decl.position,
    pathTemplate: decl.pathTemplate,
  };
  return Object.freeze(field);
}

export function assertUniqueNames(fields: readonly Field[], owner: string, kind: "input" | "output"): void {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.name)) {
      throw new DefinitionError("INVALID_DECLARATION", `Duplicate ${kind} name "${field.name}" in "${owner}"`);
    }
    seen.add(field.name);
  }
}

export type FieldDescription = {
  name: string;
  type: string;
  required: boolean;
  hash: HashPolicy;
  default?: unknown;
  help?: string;
};

/** Plain, comparable rendering of a field. */
export function describeField(field: Field): FieldDescription {
  const description: FieldDescription = {
    name: field.name,
    type: field.type.name,
    required: isRequired(field),
    hash: field.hash,
  };
  if (field.hasDefault) description.default = field.default;
  if (field.help !== undefined) description.help = field.help;
  return description;
}
