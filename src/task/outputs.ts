import { ConstructionError, DefinitionError } from "../errors.js";
import { OutputDeclarationSchema, parseOrThrow } from "../schemas.js";
import { t, TupleType, type FieldType } from "../types/field-type.js";
import { makeOutputField, type Field, type OutputFieldOptions } from "./field.js";

/**
 * Output declaration: an ordered list of names (types taken from `returns`)
 * or a name → type/options mapping.
 */
export type OutputsDeclaration<O extends string> =
  | readonly O[]
  | { readonly [K in O]: FieldType | OutputFieldOptions };

export const DEFAULT_OUTPUT = "out";

function typesFromReturns(names: readonly string[], returns: FieldType | undefined, owner: string): FieldType[] {
  if (!returns) return names.map(() => t.any);
  if (names.length === 1) return [returns];
  if (returns instanceof TupleType && returns.elements.length === names.length) {
    return [...returns.elements];
  }
  throw new DefinitionError(
    "INVALID_DECLARATION",
    `Return type ${returns.name} of "${owner}" does not describe its ${names.length} outputs (${names.join(", ")})`,
  );
}

/**
 * Canonical ordered output fields. Equivalent declarations through a name
 * list plus tuple return type, a mapping, or a bare return type produce the
 * same fields.
 */
export function normalizeOutputs(
  declaration: OutputsDeclaration<string> | undefined,
  returns: FieldType | undefined,
  owner: string,
): Field[] {
  if (declaration === undefined) {
    return [makeOutputField(DEFAULT_OUTPUT, returns ?? t.any)];
  }
  parseOrThrow(OutputDeclarationSchema, declaration, `outputs of "${owner}"`);
  if (isNameList(declaration)) {
    const duplicate = declaration.find((name, i) => declaration.indexOf(name) !== i);
    if (duplicate !== undefined) {
      throw new DefinitionError("INVALID_DECLARATION", `Duplicate output name "${duplicate}" in "${owner}"`);
    }
    const types = typesFromReturns(declaration, returns, owner);
    return declaration.map((name, i) => makeOutputField(name, types[i]));
  }
  if (returns) {
    throw new DefinitionError(
      "INVALID_DECLARATION",
      `"${owner}" declares output types twice; use either an output mapping or "returns"`,
    );
  }
  return Object.entries(declaration).map(([name, decl]) => makeOutputField(name, decl));
}

function isNameList<O extends string>(declaration: OutputsDeclaration<O>): declaration is readonly O[] {
  return Array.isArray(declaration);
}

/** Output names in declaration order, typed by the declaration. */
export function outputNames<O extends string>(declaration: OutputsDeclaration<O> | undefined, fields: readonly Field[]): O[] {
  if (declaration !== undefined && isNameList(declaration)) return [...declaration];
  // Mapping keys (or the default "out") lose their literal type through Object.entries
  return fields.map((f) => f.name as O);
}

/**
 * Map a produced value onto output fields: a single output takes the value
 * as is, several outputs take the elements of an array positionally.
 */
export function splitReturnValue(fields: readonly Field[], value: unknown, owner: string): Record<string, unknown> {
  if (fields.length === 1) {
    return { [fields[0].name]: value };
  }
  if (!Array.isArray(value) || value.length !== fields.length) {
    const got = Array.isArray(value) ? `${value.length} values` : "a single value";
    throw new ConstructionError(
      "OUTPUT_BINDING",
      `"${owner}" produced ${got} but declares ${fields.length} outputs (${fields.map((f) => f.name).join(", ")})`,
    );
  }
  return Object.fromEntries(fields.map((f, i) => [f.name, value[i]]));
}
