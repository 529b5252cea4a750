import { ConstructionError, DefinitionError } from "../errors.js";
import { parseOrThrow, ProcessDefinitionSchema, ProcessResultSchema } from "../schemas.js";
import { t, type FieldType } from "../types/field-type.js";
import { log } from "../utils/logger.js";
import {
  makeInputField,
  makeOutputField,
  type Field,
  type InputDeclaration,
  type OutputFieldOptions,
} from "./field.js";
import { TaskSpec, type TaskInstance } from "./spec.js";

export const EXECUTABLE_FIELD = "executable";

export const STANDARD_OUTPUTS = ["return_code", "stdout", "stderr"] as const;

export type StandardOutput = (typeof STANDARD_OUTPUTS)[number];

export type ProcessDefinition<O extends string> = {
  name: string;
  /** Program and fixed leading arguments */
  executable: string | readonly string[];
  inputs?: InputDeclaration;
  outputs?: { readonly [K in O]: FieldType | OutputFieldOptions };
  help?: string;
};

/** What the execution backend reports for a finished process. */
export type ProcessResult = {
  returnCode: number;
  stdout: string;
  stderr: string;
};

const PLACEHOLDER = /\{([A-Za-z_$][A-Za-z0-9_$]*)\}/g;

type Argument = {
  position?: number;
  order: number;
  args: string[];
};

export class ProcessTask<O extends string = string> extends TaskSpec<O | StandardOutput> {
  readonly kind = "process" as const;
  readonly help?: string;

  constructor(
    name: string,
    inputFields: readonly Field[],
    outputFields: readonly Field[],
    names: ReadonlyArray<O | StandardOutput>,
    help?: string,
  ) {
    super(name, inputFields, outputFields, names);
    this.help = help;
  }

  /**
   * Render the argument vector: the executable, then every set input and
   * templated output. Positive positions come first in ascending order,
   * unpositioned arguments follow in declaration order, negative positions
   * go last (-1 is the final argument).
   */
  commandLine(instance: TaskInstance<O | StandardOutput>): string[] {
    const missing = instance.missingRequired();
    if (missing.length > 0) {
      throw new ConstructionError(
        "MISSING_INPUT",
        `Cannot render the command line of "${this.name}": missing required inputs ${missing.join(", ")}`,
      );
    }
    const lazy = instance.lazyFieldNames();
    if (lazy.length > 0) {
      throw new ConstructionError(
        "INVALID_VALUE",
        `Cannot render the command line of "${this.name}": inputs ${lazy.join(", ")} are not known until the workflow runs`,
      );
    }
    const values = instance.values();
    const parts: Argument[] = [];
    let order = 0;
    for (const field of this.inputFields) {
      if (field.name === EXECUTABLE_FIELD) continue;
      const args = renderArgument(field, values[field.name]);
      if (args.length > 0) parts.push({ position: field.position, order: order++, args });
    }
    for (const field of this.outputFields) {
      if (field.pathTemplate === undefined || field.argstr === undefined) continue;
      const path = renderTemplate(field.pathTemplate, values);
      parts.push({ position: field.position, order: order++, args: [field.argstr, path] });
    }
    return [...executableArgs(values[EXECUTABLE_FIELD], this.name), ...sortArguments(parts).flatMap((p) => p.args)];
  }

  /** Standard outputs from the process result, templated outputs from the input values. */
  outputsFrom(values: Readonly<Record<string, unknown>>, produced: unknown): Record<string, unknown> {
    const result = ProcessResultSchema.safeParse(produced);
    if (!result.success) {
      throw new ConstructionError(
        "OUTPUT_BINDING",
        `"${this.name}" expects a process result with returnCode, stdout and stderr`,
      );
    }
    const outputs: Record<string, unknown> = {};
    for (const field of this.outputFields) {
      if (field.pathTemplate !== undefined) {
        outputs[field.name] = renderTemplate(field.pathTemplate, values);
      }
    }
    outputs.return_code = result.data.returnCode;
    outputs.stdout = result.data.stdout;
    outputs.stderr = result.data.stderr;
    return outputs;
  }
}

function sortArguments(parts: Argument[]): Argument[] {
  const rank = (p: Argument): number => {
    if (p.position === undefined) return 1;
    return p.position >= 0 ? 0 : 2;
  };
  return [...parts].sort((a, b) => {
    const ra = rank(a);
    const rb = rank(b);
    if (ra !== rb) return ra - rb;
    if (a.position !== undefined && b.position !== undefined && a.position !== b.position) {
      return a.position - b.position;
    }
    return a.order - b.order;
  });
}

function executableArgs(value: unknown, owner: string): string[] {
  if (typeof value === "string") return value.trim().split(/\s+/);
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) return [...value];
  throw new ConstructionError("INVALID_VALUE", `Input "${EXECUTABLE_FIELD}" of "${owner}" must be a string or a list of strings`, {
    field: EXECUTABLE_FIELD,
  });
}

function toArgument(field: Field, value: unknown): string {
  if (field.type.toArgument) return field.type.toArgument(value);
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "bigint":
      return String(value);
    default:
      throw new ConstructionError(
        "INVALID_VALUE",
        `Input "${field.name}" of type ${field.type.name} cannot be rendered as a command-line argument`,
        { field: field.name },
      );
  }
}

function renderArgument(field: Field, value: unknown): string[] {
  if (value === undefined || value === null || value === false) return [];
  const flag = field.argstr === undefined ? [] : [field.argstr];
  if (value === true) return flag;
  if (Array.isArray(value)) return [...flag, ...value.map((item) => toArgument(field, item))];
  return [...flag, toArgument(field, value)];
}

function renderTemplate(template: string, values: Readonly<Record<string, unknown>>): string {
  return template.replace(PLACEHOLDER, (_, name: string) => String(values[name]));
}

function checkTemplate(field: Field, inputs: readonly Field[], owner: string): void {
  if (field.pathTemplate === undefined) return;
  for (const match of field.pathTemplate.matchAll(PLACEHOLDER)) {
    if (!inputs.some((f) => f.name === match[1])) {
      throw new DefinitionError(
        "INVALID_DECLARATION",
        `Path template of output "${field.name}" of "${owner}" refers to unknown input "${match[1]}"`,
      );
    }
  }
}

/** Define a task backed by an external program. */
export function defineProcess<O extends string = never>(definition: ProcessDefinition<O>): ProcessTask<O> {
  parseOrThrow(ProcessDefinitionSchema, definition, "process definition");
  const { name } = definition;

  const declared = Object.entries(definition.inputs ?? {});
  if (declared.some(([key]) => key === EXECUTABLE_FIELD)) {
    throw new DefinitionError("RESERVED_NAME", `The argument '${EXECUTABLE_FIELD}' is reserved for the program to run`);
  }
  const inputFields = declared.map(([key, decl]) => makeInputField(key, decl));
  inputFields.push(
    makeInputField(EXECUTABLE_FIELD, {
      type: t.union(t.str, t.list(t.str)),
      default: definition.executable,
      help: "Program and fixed leading arguments",
    }),
  );

  const outputEntries: Array<[O, FieldType | OutputFieldOptions]> = [];
  for (const key of outputKeys(definition.outputs)) {
    if (STANDARD_OUTPUTS.some((std) => std === key)) {
      throw new DefinitionError("RESERVED_NAME", `The output '${key}' is reserved for the process result`);
    }
    const decl = definition.outputs?.[key];
    if (decl !== undefined) outputEntries.push([key, decl]);
  }
  const outputFields = outputEntries.map(([key, decl]) => makeOutputField(key, decl));
  for (const field of outputFields) checkTemplate(field, inputFields, name);
  outputFields.push(
    makeOutputField("return_code", t.int),
    makeOutputField("stdout", t.str),
    makeOutputField("stderr", t.str),
  );

  const names: Array<O | StandardOutput> = [...outputEntries.map(([key]) => key), ...STANDARD_OUTPUTS];
  log.debug("Defined process task", { name, outputs: names });
  return new ProcessTask<O>(name, inputFields, outputFields, names, definition.help);
}

function outputKeys<O extends string>(outputs: { readonly [K in O]: FieldType | OutputFieldOptions } | undefined): O[] {
  if (outputs === undefined) return [];
  // Object.keys loses the key type of the mapping
  return Object.keys(outputs) as O[];
}
