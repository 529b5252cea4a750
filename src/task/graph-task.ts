import { DefinitionError } from "../errors.js";
import { parseOrThrow, WorkflowDefinitionSchema } from "../schemas.js";
import { t, type FieldType } from "../types/field-type.js";
import { log } from "../utils/logger.js";
import type { Workflow } from "../workflow/workflow.js";
import { makeInputField, type InputDeclaration, type InputFieldOptions } from "./field.js";
import { normalizeOutputs, outputNames, splitReturnValue, type OutputsDeclaration } from "./outputs.js";
import { TaskSpec } from "./spec.js";

/** Hidden input holding the graph constructor. */
export const CONSTRUCTOR_FIELD = "constructor";

/**
 * Builds the graph of a workflow task. Inputs that are not known during
 * construction arrive as lazy fields; the rest arrive as concrete values.
 * The return value is bound to the workflow outputs (an array for several
 * outputs); returning nothing means the outputs were assigned through
 * `wf.outputs`.
 */
export type WorkflowBuilder<I extends string> = (inputs: Readonly<Record<I, unknown>>, wf: Workflow) => unknown;

export type WorkflowDefinition<I extends string, O extends string> = {
  name: string;
  inputs?: { readonly [K in I]: FieldType | InputFieldOptions };
  outputs?: OutputsDeclaration<O>;
  returns?: FieldType;
  build: WorkflowBuilder<I>;
  help?: string;
};

export class GraphTask<O extends string = string, I extends string = string> extends TaskSpec<O> {
  readonly kind = "graph" as const;
  readonly build: WorkflowBuilder<I>;
  readonly help?: string;

  constructor(definition: WorkflowDefinition<I, O>) {
    const { name } = definition;
    const inputs: InputDeclaration = definition.inputs ?? {};
    const declared = Object.entries(inputs);
    if (declared.some(([key]) => key === CONSTRUCTOR_FIELD)) {
      throw new DefinitionError("RESERVED_NAME", `The argument '${CONSTRUCTOR_FIELD}' is reserved for the graph constructor`);
    }
    const inputFields = declared.map(([key, decl]) => makeInputField(key, decl));
    // Hashed by identity: equal source text does not imply equal captured state
    inputFields.push(
      makeInputField(CONSTRUCTOR_FIELD, {
        type: t.callable,
        default: definition.build,
        hash: "by-equality",
        help: "Builds the workflow graph",
      }),
    );
    const outputFields = normalizeOutputs(definition.outputs, definition.returns, name);
    super(name, inputFields, outputFields, outputNames(definition.outputs, outputFields));
    this.build = definition.build;
    this.help = definition.help;
  }

  /** Names of the inputs handed to the constructor. */
  get visibleInputs(): string[] {
    return this.inputFields.filter((f) => f.name !== CONSTRUCTOR_FIELD).map((f) => f.name);
  }

  outputsFrom(_values: Readonly<Record<string, unknown>>, produced: unknown): Record<string, unknown> {
    return splitReturnValue(this.outputFields, produced, this.name);
  }
}

export function isGraphTask(spec: TaskSpec): spec is GraphTask {
  return spec.kind === "graph";
}

/** Define a workflow task: a task whose body is a graph of other tasks. */
export function defineWorkflow<I extends string = never, O extends string = "out">(
  definition: WorkflowDefinition<I, O>,
): GraphTask<O, I> {
  parseOrThrow(WorkflowDefinitionSchema, definition, "workflow definition");
  const task = new GraphTask<O, I>(definition);
  log.debug("Defined workflow task", { name: task.name, inputs: task.visibleInputs });
  return task;
}
