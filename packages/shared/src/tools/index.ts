/**
 * Agent Tools Module
 */

import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import { ToolRegistry } from './registry';
import { createJourneyExtractionTool, type JourneyToolOptions } from './journey-tool';

export { ToolRegistry } from './registry';
export {
  ToolInvocationError,
  type AgentTool,
  type ToolArguments,
  type ToolParametersSchema,
} from './types';
export {
  createJourneyExtractionTool,
  JOURNEY_TOOL_NAME,
  type JourneyToolOptions,
} from './journey-tool';

/**
 * Registry holding the journey extraction tool.
 */
export function createDefaultToolRegistry(options: JourneyToolOptions = {}): ToolRegistry {
  return new ToolRegistry().register(createJourneyExtractionTool(options));
}

/**
 * Render registered tools as OpenAI function-tool definitions.
 */
export function toOpenAiTools(registry: ToolRegistry): ChatCompletionTool[] {
  return registry.list().map((tool): ChatCompletionTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}
