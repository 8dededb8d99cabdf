/**
 * Journey extraction exposed as an agent tool.
 */

import { extractJourneyInfoAsync } from '../extractors/pipeline';
import type { AsyncPredictor } from '../extractors/types';
import type { AgentTool, ToolArguments } from './types';

export const JOURNEY_TOOL_NAME = 'extract_journey_info';

export interface JourneyToolOptions {
  /** Predictor used to refine low-confidence extractions */
  predict?: AsyncPredictor;
}

export function createJourneyExtractionTool(options: JourneyToolOptions = {}): AgentTool {
  const { predict } = options;

  return {
    name: JOURNEY_TOOL_NAME,
    description:
      'Extract journey_id, score, reason and solution from text and return JSON.',
    parameters: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'Free text describing a journey, its score and what went wrong',
        },
      },
      required: ['text'],
      additionalProperties: false,
    },
    run: (args: ToolArguments) => extractJourneyInfoAsync(args.text, predict),
  };
}
