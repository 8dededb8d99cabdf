/**
 * OpenAI Predictor Tests
 *
 * The chat client is replaced by an in-process fake.
 */

import {
  createOpenAiPredictor,
  extractJourneyRecordAsync,
  type ChatCompletionClient,
} from '@journey-extractor/shared';
import { MODEL_REPLY, UNLABELLED_TEXT } from './helpers';

function fakeClient(content: string | null) {
  const create = jest.fn(async () => ({
    id: 'chatcmpl-test',
    choices: [{ message: { content } }],
  }));
  const client: ChatCompletionClient = { chat: { completions: { create } } };
  return { client, create };
}

describe('OpenAI Predictor', () => {
  it('should send the prompt as a JSON-mode chat completion', async () => {
    const { client, create } = fakeClient(MODEL_REPLY);
    const predict = createOpenAiPredictor({ client, model: 'test-model' });

    await expect(predict('extract this')).resolves.toBe(MODEL_REPLY);

    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          expect.objectContaining({ role: 'system' }),
          { role: 'user', content: 'extract this' },
        ],
      })
    );
  });

  it('should reject on an empty completion', async () => {
    const { client } = fakeClient(null);
    const predict = createOpenAiPredictor({ client, model: 'test-model' });

    await expect(predict('extract this')).rejects.toThrow('Empty response from OpenAI');
  });

  it('should refine a low-confidence record through the pipeline', async () => {
    const { client } = fakeClient(MODEL_REPLY);
    const record = await extractJourneyRecordAsync(
      UNLABELLED_TEXT,
      createOpenAiPredictor({ client, model: 'test-model' })
    );

    expect(record.confidence).toBe('llm');
    expect(record.solution).toBe('delay notice');
  });

  it('should leave the fallback record in place when the request fails', async () => {
    const client: ChatCompletionClient = {
      chat: {
        completions: {
          create: () => Promise.reject(new Error('connect ECONNREFUSED')),
        },
      },
    };
    const record = await extractJourneyRecordAsync(
      UNLABELLED_TEXT,
      createOpenAiPredictor({ client, model: 'test-model' })
    );

    expect(record.confidence).toBe('low');
    expect(record.score).toBe('minus two');
  });
});
