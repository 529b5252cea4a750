import { z } from "zod";
import { ConfigError, DefinitionError } from "./errors.js";
import { isFieldType, type FieldType } from "./types/field-type.js";

export const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, { message: "must be a valid identifier" });

export const FieldTypeSchema = z.custom<FieldType>(isFieldType, { message: "must be a field type" });

export const HashPolicySchema = z.enum(["by-value", "by-equality"]);

export const InputFieldOptionsSchema = z
  .object({
    type: FieldTypeSchema.optional(),
    default: z.unknown().optional(),
    optional: z.boolean().optional(),
    converter: z.custom<(value: unknown) => unknown>((v) => typeof v === "function").optional(),
    hash: HashPolicySchema.optional(),
    help: z.string().optional(),
    argstr: z.string().optional(),
    position: z.number().int().optional(),
  })
  .strict();

export const OutputFieldOptionsSchema = z
  .object({
    type: FieldTypeSchema.optional(),
    help: z.string().optional(),
    pathTemplate: z.string().optional(),
    argstr: z.string().optional(),
    position: z.number().int().optional(),
  })
  .strict();

export const InputDeclarationSchema = z.record(IdentifierSchema, z.union([FieldTypeSchema, InputFieldOptionsSchema]));

export const OutputDeclarationSchema = z.union([
  z.array(IdentifierSchema).nonempty({ message: "must name at least one output" }),
  z.record(IdentifierSchema, z.union([FieldTypeSchema, OutputFieldOptionsSchema])),
]);

export const NodeNameSchema = IdentifierSchema;

export const ConfigSchema = z.object({
  cache: z.object({
    enabled: z.boolean(),
  }),
  hashing: z.object({
    algorithm: z.enum(["sha256", "sha1", "md5"]),
    digestLength: z.number().int().min(0),
  }),
  naming: z.object({
    separator: z.string().min(1),
  }),
  state: z.object({
    absorbPolicy: z.enum(["absorb", "inherit"]),
  }),
  log: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
  }),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse with a schema, mapping failures to engine errors. `context` names what
 * was being parsed; "config" failures raise ConfigError, the rest DefinitionError.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, context: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = `Invalid ${context}: ${describeIssues(result.error)}`;
    if (context === "config") throw new ConfigError(msg);
    throw new DefinitionError("INVALID_DECLARATION", msg);
  }
  return result.data;
}

const CallableSchema = z.custom<(...args: never[]) => unknown>((v) => typeof v === "function", {
  message: "must be a function",
});

export const FunctionDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  function: CallableSchema,
  inputs: InputDeclarationSchema.optional(),
  outputs: OutputDeclarationSchema.optional(),
  returns: FieldTypeSchema.optional(),
  params: z.array(IdentifierSchema).optional(),
  help: z.string().optional(),
});

export const ProcessDefinitionSchema = z.object({
  name: IdentifierSchema,
  executable: z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()]),
  inputs: InputDeclarationSchema.optional(),
  outputs: z.record(IdentifierSchema, z.union([FieldTypeSchema, OutputFieldOptionsSchema])).optional(),
  help: z.string().optional(),
});

export const WorkflowDefinitionSchema = z.object({
  name: IdentifierSchema,
  inputs: InputDeclarationSchema.optional(),
  outputs: OutputDeclarationSchema.optional(),
  returns: FieldTypeSchema.optional(),
  build: CallableSchema,
  help: z.string().optional(),
});

export const ProcessResultSchema = z.object({
  returnCode: z.number().int(),
  stdout: z.string(),
  stderr: z.string(),
});
