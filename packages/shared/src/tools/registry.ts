/**
 * Tool Registry
 *
 * Holds the agent tools a caller exposes. Instances are built and passed
 * explicitly; there is no module-level registry.
 */

import type { ValidateFunction } from 'ajv';
import { compileSchema, runValidator } from '../schemas';
import { logger } from '../logger';
import { ToolInvocationError, type AgentTool, type ToolArguments } from './types';

interface RegisteredTool {
  tool: AgentTool;
  validate: ValidateFunction;
}

function isPlainObject(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /**
   * Register a tool. Overwrites any existing tool with the same name.
   */
  register(tool: AgentTool): this {
    this.tools.set(tool.name, { tool, validate: compileSchema(tool.parameters) });

    logger.debug('Registered tool', {
      tool_name: tool.name,
      description: tool.description,
    });

    return this;
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name)?.tool;
  }

  /**
   * @throws ToolInvocationError if no tool is registered under `name`
   */
  getOrThrow(name: string): AgentTool {
    const tool = this.get(name);
    if (!tool) {
      throw new ToolInvocationError(`No tool registered with name: ${name}`, name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): AgentTool[] {
    return Array.from(this.tools.values(), (entry) => entry.tool);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Invoke a tool by name. `rawArgs` is either the JSON string from a model's
   * tool call or an already-parsed object.
   */
  async invoke(name: string, rawArgs: string | ToolArguments = {}): Promise<string> {
    const entry = this.tools.get(name);
    if (!entry) {
      throw new ToolInvocationError(`No tool registered with name: ${name}`, name);
    }

    const args = this.parseArguments(name, rawArgs);

    const result = runValidator(entry.validate, args);
    if (!result.valid) {
      throw new ToolInvocationError(
        `Invalid arguments for tool ${name}`,
        name,
        result.errors ?? []
      );
    }

    const startTime = Date.now();
    const output = await entry.tool.run(args);

    logger.debug('Tool invoked', {
      tool_name: name,
      duration_ms: Date.now() - startTime,
    });

    return output;
  }

  private parseArguments(name: string, rawArgs: string | ToolArguments): ToolArguments {
    if (typeof rawArgs !== 'string') {
      return rawArgs;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawArgs);
    } catch (error) {
      throw new ToolInvocationError(
        `Tool arguments for ${name} are not valid JSON`,
        name,
        [error instanceof Error ? error.message : String(error)]
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ToolInvocationError(`Tool arguments for ${name} must be a JSON object`, name);
    }
    return parsed;
  }
}
