// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { SweepgraphConfig, AbsorbPolicy, HashAlgorithm } from "./config.js";

// Errors
export {
  PipelineError,
  DefinitionError,
  ConstructionError,
  StateError,
  HashingError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode, ConstructionContext } from "./errors.js";

// Schemas
export { parseOrThrow, ConfigSchema, InputFieldOptionsSchema, OutputFieldOptionsSchema } from "./schemas.js";

// Field types
export {
  t,
  isCompatible,
  isFieldType,
  elementTypeOf,
  AnyType,
  PrimitiveType,
  ListType,
  TupleType,
  UnionType,
} from "./types/field-type.js";
export type { FieldType } from "./types/field-type.js";

// Task specifications
export { describeField, isRequired } from "./task/field.js";
export type {
  Field,
  FieldDescription,
  HashPolicy,
  Converter,
  InputDeclaration,
  InputFieldOptions,
  OutputFieldOptions,
} from "./task/field.js";
export { DEFAULT_OUTPUT } from "./task/outputs.js";
export type { OutputsDeclaration } from "./task/outputs.js";
export { TaskSpec, TaskInstance } from "./task/spec.js";
export type { TaskKind, LazyBinding, SplitValue } from "./task/spec.js";
export { defineFunction, FunctionTask, FUNCTION_FIELD } from "./task/function-task.js";
export type { AnyFunction, FunctionClass, FunctionDefinition, FunctionOptions } from "./task/function-task.js";
export { defineProcess, ProcessTask, EXECUTABLE_FIELD, STANDARD_OUTPUTS } from "./task/process-task.js";
export type { ProcessDefinition, ProcessResult, StandardOutput } from "./task/process-task.js";
export { defineWorkflow, GraphTask, isGraphTask, CONSTRUCTOR_FIELD } from "./task/graph-task.js";
export type { WorkflowBuilder, WorkflowDefinition } from "./task/graph-task.js";

// Hashing
export { hashValue, hashFunction, hashField, equalityToken, normalizeSource } from "./hash/hash.js";
export type { ContentHashable, InstanceHashes } from "./hash/hash.js";

// Lazy fields
export { LazyField, LazyInField, LazyOutField, isLazy } from "./lazy/lazy-field.js";

// State
export { NodeState, deriveState, describeState, resolveCombiner } from "./state/state.js";
export type { Axis, SplitterTerm, StateInput, UpstreamState } from "./state/state.js";
export { shouldAbsorb, resolveBinding, resolveSplitBinding } from "./state/policy.js";
export type { BindingMode, ResolvedBinding } from "./state/policy.js";

// Workflows
export { Workflow, WorkflowOutputs } from "./workflow/workflow.js";
export type { AddOptions, ConstructOptions } from "./workflow/workflow.js";
export { Node, stateOf } from "./workflow/node.js";
export { ConstructionCache, defaultConstructionCache, constructionKey } from "./workflow/construction-cache.js";
export type { ConstructionKey, ConstructionCacheStats } from "./workflow/construction-cache.js";

// Planning
export { planWorkflow, validate, topologicalSort, layers, downstreamOf } from "./planner/plan.js";
export type { ExecutionPlan, PlannedNode } from "./planner/plan.js";

// Utils
export { log, setLogLevel, setLogSink } from "./utils/logger.js";
export type { Logger, LogLevel, LogSink } from "./utils/logger.js";
