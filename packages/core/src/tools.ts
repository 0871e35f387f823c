/** JSON Schema type for tool input definitions. */
export type JSONSchema = Record<string, unknown>;

/** Object schema describing a tool's named parameters. */
export interface InputSchema {
  type: 'object';
  properties: Record<string, JSONSchema>;
  required?: string[];
  additionalProperties: boolean;
}

/** Value types a tool parameter can carry. */
export type ParameterType = 'string' | 'boolean';

/** A single named parameter accepted by a tool. */
export interface ToolParameter {
  name: string;
  type: ParameterType;
  description: string;
  required?: boolean;
  /** Applied when the caller omits the parameter. */
  default?: string | boolean;
  /** Allowed values for string parameters. */
  enum?: readonly string[];
  /** Regular expression (source) a string value must match. */
  pattern?: string;
}

/**
 * Where a tool runs: inside a project directory under the projects root,
 * or in the projects root itself regardless of any Vagrantfile.
 */
export type ToolScope = 'project' | 'global';

export interface ToolAnnotations {
  readOnly?: boolean;
  destructive?: boolean;
  idempotent?: boolean;
}

/** Static description of one remotely invokable operation. */
export interface ToolDefinition {
  name: string;
  description: string;
  /** Ordered parameter list; order is preserved in the published schema. */
  parameters: readonly ToolParameter[];
  scope: ToolScope;
  annotations?: ToolAnnotations;
}

/** Parameter values after validation and defaulting. */
export type ToolParams = Readonly<Record<string, string | boolean | undefined>>;

/** One incoming tool call. */
export interface InvocationRequest {
  name: string;
  arguments?: Record<string, unknown>;
}

/** Outcome of running one child process to completion. */
export interface ExecutionResult {
  exitCode: number;
  /** Signal that terminated the child, when it did not exit on its own. */
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Classification of a failed dispatch. */
export type ToolErrorKind =
  | 'tool_not_found'
  | 'invalid_parameters'
  | 'path_violation'
  | 'project_not_found'
  | 'execution_error'
  | 'timeout';

/** Terminal artifact of one dispatch cycle. */
export interface ToolResponse {
  success: boolean;
  content: string;
  error?: string;
  errorKind?: ToolErrorKind;
  durationMs: number;
}

/**
 * Render a definition's parameter list as the JSON Schema published to
 * MCP clients.
 */
export function toInputSchema(definition: ToolDefinition): InputSchema {
  const properties: Record<string, JSONSchema> = {};
  const required: string[] = [];

  for (const param of definition.parameters) {
    const property: JSONSchema = { type: param.type, description: param.description };
    if (param.enum) property['enum'] = [...param.enum];
    if (param.pattern) property['pattern'] = param.pattern;
    if (param.default !== undefined) property['default'] = param.default;
    properties[param.name] = property;
    if (param.required) required.push(param.name);
  }

  const schema: InputSchema = {
    type: 'object',
    properties,
    additionalProperties: false,
  };
  if (required.length > 0) schema.required = required;
  return schema;
}
