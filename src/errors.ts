export type ErrorCode =
  | "UNRECOGNISED_INPUT"
  | "RESERVED_NAME"
  | "INVALID_DECLARATION"
  | "TYPE_MISMATCH"
  | "INVALID_VALUE"
  | "MISSING_INPUT"
  | "DUPLICATE_NODE"
  | "UNKNOWN_NODE"
  | "UNKNOWN_OUTPUT"
  | "FORWARD_REFERENCE"
  | "INVALID_SPLIT"
  | "INVALID_AXIS"
  | "STATE_LOCKED"
  | "OUTPUT_BINDING"
  | "SEALED"
  | "RECURSIVE_CONSTRUCTION"
  | "UNHASHABLE"
  | "INVALID_CONFIG";

/** Base class for every error raised by the engine. */
export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised while a task specification is being declared. */
export class DefinitionError extends PipelineError {}

export type ConstructionContext = {
  node?: string;
  field?: string;
};

/** Raised while a workflow graph is being assembled. */
export class ConstructionError extends PipelineError {
  readonly node?: string;
  readonly field?: string;

  constructor(code: ErrorCode, message: string, context: ConstructionContext = {}) {
    super(code, message);
    this.node = context.node;
    this.field = context.field;
  }
}

/** A node's replication state cannot change because its outputs are already bound. */
export class StateError extends ConstructionError {}

export class HashingError extends PipelineError {
  constructor(message: string) {
    super("UNHASHABLE", message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}
