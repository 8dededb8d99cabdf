/**
 * OpenAI-backed Predictor
 *
 * Adapts the OpenAI chat completions API to the refiner's predictor contract.
 * The SDK timeout is the only timeout. SDK retries are off: one refinement
 * is one request.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { AsyncPredictor } from './types';

const SYSTEM_PROMPT =
  'You extract structured journey data and answer with a single JSON object only.';

/**
 * The part of a chat completion the predictor reads
 */
interface ChatCompletionLike {
  id?: string;
  choices: Array<{ message?: { content?: string | null } }>;
}

/**
 * Minimal client surface, satisfied by the OpenAI SDK client
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletionLike>;
    };
  };
}

export interface OpenAiPredictorOptions {
  /** OpenAI API key (uses config / env var if not provided) */
  apiKey?: string;
  /** Model name */
  model?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Alternate API base URL (Azure or proxy deployments) */
  baseUrl?: string;
  /** Pre-built client, mainly for tests */
  client?: ChatCompletionClient;
}

function createClient(options: OpenAiPredictorOptions): ChatCompletionClient {
  const baseURL = options.baseUrl || config.openaiBaseUrl;
  return new OpenAI({
    apiKey: options.apiKey || config.openaiApiKey,
    timeout: options.timeoutMs || config.llmRequestTimeoutMs,
    maxRetries: 0,
    ...(baseURL ? { baseURL } : {}),
  });
}

/**
 * Create a predictor that sends the refinement prompt to OpenAI and returns
 * the raw reply text. Errors are rethrown for the refiner to absorb.
 */
export function createOpenAiPredictor(options: OpenAiPredictorOptions = {}): AsyncPredictor {
  const model = options.model || config.llmModel;
  const client = options.client ?? createClient(options);

  return async (prompt: string): Promise<string> => {
    const startTime = Date.now();

    try {
      const response = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        response_format: { type: 'json_object' },
        temperature: 0,
      });

      const durationMs = Date.now() - startTime;
      llmRequestDurationHistogram.observe({ model }, durationMs / 1000);

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty response from OpenAI');
      }

      llmRequestsCounter.inc({ model, status: 'success' });
      logger.info('LLM refinement request complete', {
        model,
        request_id: response.id,
        duration_ms: durationMs,
      });

      return content;
    } catch (error) {
      llmRequestsCounter.inc({ model, status: 'error' });
      logger.error('LLM refinement request failed', error, {
        model,
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  };
}
