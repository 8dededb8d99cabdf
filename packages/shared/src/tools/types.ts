/**
 * Agent Tool Types
 */

/**
 * JSON Schema for a tool's arguments. Declared as a type alias so it stays
 * assignable to OpenAI's FunctionParameters.
 */
export type ToolParametersSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolArguments = Record<string, unknown>;

/**
 * A named capability an agent can call with JSON arguments.
 */
export interface AgentTool {
  /** Unique name, used as the function name in tool calls */
  readonly name: string;
  /** Description shown to the model */
  readonly description: string;
  /** Argument schema, validated before each run */
  readonly parameters: ToolParametersSchema;
  /** Run the tool with validated arguments */
  run(args: ToolArguments): string | Promise<string>;
}

/**
 * Raised for unknown tools and arguments that fail to parse or validate.
 */
export class ToolInvocationError extends Error {
  constructor(
    message: string,
    readonly toolName: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}
