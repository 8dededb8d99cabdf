/**
 * Tool Registry Tests
 */

import {
  ToolRegistry,
  ToolInvocationError,
  createDefaultToolRegistry,
  createJourneyExtractionTool,
  toOpenAiTools,
  JOURNEY_TOOL_NAME,
  type AgentTool,
} from '@journey-extractor/shared';
import { MODEL_REPLY, UNLABELLED_TEXT } from './helpers';

const echoTool: AgentTool = {
  name: 'echo',
  description: 'Echo the message back',
  parameters: {
    type: 'object',
    properties: { message: { type: 'string' } },
    required: ['message'],
    additionalProperties: false,
  },
  run: (args) => String(args.message),
};

describe('ToolRegistry', () => {
  it('should register and look up tools', () => {
    const registry = new ToolRegistry().register(echoTool);

    expect(registry.has('echo')).toBe(true);
    expect(registry.get('echo')).toBe(echoTool);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.names()).toEqual(['echo']);
    expect(registry.list()).toEqual([echoTool]);
  });

  it('should overwrite a tool registered under the same name', () => {
    const replacement: AgentTool = { ...echoTool, run: () => 'replaced' };
    const registry = new ToolRegistry().register(echoTool).register(replacement);

    expect(registry.list()).toHaveLength(1);
    expect(registry.get('echo')).toBe(replacement);
  });

  it('should throw for unknown tools', async () => {
    const registry = new ToolRegistry();

    expect(() => registry.getOrThrow('missing')).toThrow(ToolInvocationError);
    await expect(registry.invoke('missing', {})).rejects.toThrow(
      'No tool registered with name: missing'
    );
  });

  describe('invoke', () => {
    const registry = new ToolRegistry().register(echoTool);

    it('should accept JSON string arguments', async () => {
      await expect(registry.invoke('echo', '{"message": "hi"}')).resolves.toBe('hi');
    });

    it('should accept parsed arguments', async () => {
      await expect(registry.invoke('echo', { message: 'hello' })).resolves.toBe('hello');
    });

    it('should reject malformed JSON', async () => {
      await expect(registry.invoke('echo', '{message: hi}')).rejects.toThrow(
        'Tool arguments for echo are not valid JSON'
      );
    });

    it('should reject JSON that is not an object', async () => {
      await expect(registry.invoke('echo', '["hi"]')).rejects.toThrow(
        'Tool arguments for echo must be a JSON object'
      );
    });

    it('should reject arguments that fail the schema', async () => {
      const error: unknown = await registry.invoke('echo', { message: 1, extra: true }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ToolInvocationError);
      if (error instanceof ToolInvocationError) {
        expect(error.toolName).toBe('echo');
        expect(error.details).toHaveLength(2);
      }
    });
  });
});

describe('Journey extraction tool', () => {
  it('should be registered by default', () => {
    expect(createDefaultToolRegistry().names()).toEqual([JOURNEY_TOOL_NAME]);
  });

  it('should return the record JSON for labelled text', async () => {
    const output = await createDefaultToolRegistry().invoke(
      JOURNEY_TOOL_NAME,
      '{"text": "JourneyId: 5\\nScore: 1"}'
    );

    expect(output).toBe(
      '{"journey_id":"5","score":"1","score_numeric":1,"reason":null,"solution":null,"confidence":"heuristic"}'
    );
  });

  it('should pass its predictor to the pipeline', async () => {
    const registry = createDefaultToolRegistry({ predict: async () => MODEL_REPLY });
    const output = await registry.invoke(JOURNEY_TOOL_NAME, { text: UNLABELLED_TEXT });

    expect(JSON.parse(output).confidence).toBe('llm');
  });

  it('should require a text argument', async () => {
    await expect(createDefaultToolRegistry().invoke(JOURNEY_TOOL_NAME, {})).rejects.toThrow(
      ToolInvocationError
    );
  });

  it('should render as an OpenAI function tool', () => {
    const tool = createJourneyExtractionTool();
    const registry = new ToolRegistry().register(tool);

    expect(toOpenAiTools(registry)).toEqual([
      {
        type: 'function',
        function: {
          name: 'extract_journey_info',
          description: tool.description,
          parameters: tool.parameters,
        },
      },
    ]);
  });
});
