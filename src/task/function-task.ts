import { ConstructionError, DefinitionError } from "../errors.js";
import { FunctionDefinitionSchema, parseOrThrow } from "../schemas.js";
import { isFieldType, t, type FieldType } from "../types/field-type.js";
import { log } from "../utils/logger.js";
import { makeInputField, type Field, type InputDeclaration, type InputFieldOptions } from "./field.js";
import { normalizeOutputs, outputNames, splitReturnValue, type OutputsDeclaration } from "./outputs.js";
import { parameterNames, type Parameter } from "./signature.js";
import { TaskSpec, type TaskInstance } from "./spec.js";

export type AnyFunction = (...args: never[]) => unknown;

/** Hidden input holding the wrapped callable; replacing it swaps the implementation. */
export const FUNCTION_FIELD = "function";

export type FunctionOptions<O extends string> = {
  /** Task name (defaults to the function's name) */
  name?: string;
  /** Input types and options by parameter name; unlisted parameters take `t.any` */
  inputs?: InputDeclaration;
  outputs?: OutputsDeclaration<O>;
  /** Return type; a tuple type describes several outputs positionally */
  returns?: FieldType;
  /** Parameter names, for callables whose source does not reveal them */
  params?: readonly string[];
  help?: string;
};

export type FunctionDefinition<O extends string> = FunctionOptions<O> & {
  function: AnyFunction;
};

/** Class-style declaration: the task is described by static members. */
export type FunctionClass<O extends string> = {
  readonly name: string;
  readonly function: AnyFunction;
  readonly inputs?: InputDeclaration;
  readonly outputs?: OutputsDeclaration<O>;
  readonly returns?: FieldType;
  readonly params?: readonly string[];
  readonly help?: string;
};

export class FunctionTask<O extends string = string> extends TaskSpec<O> {
  readonly kind = "function" as const;
  readonly fn: AnyFunction;
  readonly parameters: readonly Parameter[];
  readonly help?: string;

  constructor(
    name: string,
    fn: AnyFunction,
    parameters: readonly Parameter[],
    inputFields: readonly Field[],
    outputFields: readonly Field[],
    names: readonly O[],
    help?: string,
  ) {
    super(name, inputFields, outputFields, names);
    this.fn = fn;
    this.parameters = Object.freeze([...parameters]);
    this.help = help;
  }

  outputsFrom(_values: Readonly<Record<string, unknown>>, produced: unknown): Record<string, unknown> {
    return splitReturnValue(this.outputFields, produced, this.name);
  }

  /**
   * Call the function with the instance's values and bind the result to the
   * outputs. Every input must be concrete.
   */
  run(instance: TaskInstance<O>): Record<string, unknown> {
    const missing = instance.missingRequired();
    if (missing.length > 0) {
      throw new ConstructionError("MISSING_INPUT", `Cannot run "${this.name}": missing required inputs ${missing.join(", ")}`);
    }
    const lazy = instance.lazyFieldNames();
    if (lazy.length > 0) {
      throw new ConstructionError(
        "INVALID_VALUE",
        `Cannot run "${this.name}": inputs ${lazy.join(", ")} are not known until the workflow runs`,
      );
    }
    const values = instance.values();
    const fn = values[FUNCTION_FIELD];
    if (typeof fn !== "function") {
      throw new ConstructionError("INVALID_VALUE", `Input "${FUNCTION_FIELD}" of "${this.name}" is not callable`, {
        field: FUNCTION_FIELD,
      });
    }
    const args = this.parameters.map((p) => values[p.name]);
    const produced: unknown = Reflect.apply(fn, undefined, args);
    return this.outputsFrom(values, produced);
  }
}

function isFunctionClass<O extends string>(target: AnyFunction | FunctionClass<O>): target is FunctionClass<O> {
  return "function" in target && typeof target.function === "function";
}

function isDefinition<O extends string>(
  target: AnyFunction | FunctionClass<O> | FunctionDefinition<O>,
): target is FunctionDefinition<O> {
  return typeof target === "object";
}

/**
 * Define a function-backed task from a bare function, a definition object or
 * a class with static `function`, `inputs`, `outputs` and `returns` members.
 * Inputs follow the function's parameters; the explicit `inputs` map only
 * refines their types and options.
 */
export function defineFunction<O extends string = "out">(
  target: AnyFunction | FunctionClass<O> | FunctionDefinition<O>,
  options: FunctionOptions<O> = {},
): FunctionTask<O> {
  let definition: FunctionDefinition<O>;
  if (isDefinition(target)) {
    definition = { ...target, ...options };
  } else if (isFunctionClass<O>(target)) {
    definition = {
      name: target.name,
      function: target.function,
      inputs: target.inputs,
      outputs: target.outputs,
      returns: target.returns,
      params: target.params,
      help: target.help,
      ...options,
    };
  } else {
    definition = { ...options, function: target };
  }
  parseOrThrow(FunctionDefinitionSchema, definition, "function definition");

  const fn = definition.function;
  const name = definition.name ?? fn.name;
  const parameters = resolveParameters(fn, definition.params, name);
  const explicit = definition.inputs ?? {};

  const unrecognised = Object.keys(explicit).filter((key) => !parameters.some((p) => p.name === key));
  if (unrecognised.length > 0) {
    throw new DefinitionError(
      "UNRECOGNISED_INPUT",
      `Unrecognised input names (${unrecognised.join(", ")}) for "${name}"; its parameters are (${parameters.map((p) => p.name).join(", ")})`,
    );
  }

  const inputFields = parameters.map((p) => {
    const decl = explicit[p.name] ?? t.any;
    if (!p.hasDefault) return makeInputField(p.name, decl);
    // A parameter with its own default is optional unless declared otherwise
    const options: InputFieldOptions = isFieldType(decl) ? { type: decl } : decl;
    if ("default" in options || options.optional !== undefined) return makeInputField(p.name, options);
    return makeInputField(p.name, { ...options, optional: true });
  });
  inputFields.push(
    makeInputField(FUNCTION_FIELD, { type: t.callable, default: fn, help: "Callable invoked with the other inputs" }),
  );

  const outputFields = normalizeOutputs(definition.outputs, definition.returns, name);
  const task = new FunctionTask<O>(
    name,
    fn,
    parameters,
    inputFields,
    outputFields,
    outputNames(definition.outputs, outputFields),
    definition.help,
  );
  log.debug("Defined function task", {
    name,
    inputs: parameters.map((p) => p.name),
    outputs: outputFields.map((f) => f.name),
  });
  return task;
}

function resolveParameters(fn: AnyFunction, params: readonly string[] | undefined, owner: string): Parameter[] {
  let resolved: Parameter[];
  if (params) {
    resolved = params.map((name) => ({ name, hasDefault: false }));
  } else {
    const parsed = parameterNames(fn);
    if (!parsed) {
      throw new DefinitionError(
        "INVALID_DECLARATION",
        `Cannot read the parameter names of "${owner}" (destructured parameters); pass "params" explicitly`,
      );
    }
    resolved = parsed;
  }
  if (resolved.some((p) => p.name === FUNCTION_FIELD)) {
    throw new DefinitionError("RESERVED_NAME", `The argument '${FUNCTION_FIELD}' is reserved for the wrapped callable`);
  }
  return resolved;
}
