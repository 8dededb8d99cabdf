/**
 * LLM Refinement
 *
 * One call to a caller-supplied predictor for low-confidence records. The reply
 * is searched for the first valid JSON object; anything else leaves the
 * fallback record untouched. Failures are logged and never thrown.
 */

import type { JourneyFields, JourneyRecord } from '../types';
import type { AsyncPredictor, Predictor } from './types';
import { buildRecord, cleanFieldValue } from './record';
import { logger } from '../logger';

export const REFINEMENT_PROMPT_VERSION = '1.0.0';

/** Longest reason/solution kept from a model reply */
export const MAX_REFINED_SPAN_CHARS = 300;

/**
 * Build the fixed extraction prompt for a journey text.
 */
export function buildRefinementPrompt(text: string): string {
  return [
    "You are a precise data extractor. Given the following text, extract exactly the fields 'journey_id', 'score', 'reason', 'solution'.",
    'Return only one valid JSON object with these four keys (use null when a value is not stated in the text).',
    'Do not add any explanation, markdown or text outside the JSON object. Do not invent values.',
    '',
    'TEXT:',
    text,
    '',
    'Output JSON example:',
    '{"journey_id": null, "score": null, "reason": null, "solution": null}',
  ].join('\n');
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Index of the brace closing the object that opens at `start`, honouring
 * strings and escapes. -1 when the object never closes.
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * First syntactically valid JSON object in a model reply, or null.
 * Leading prose, markdown fences and trailing commentary are skipped.
 */
export function findFirstJsonObject(reply: string): Record<string, unknown> | null {
  let start = reply.indexOf('{');

  while (start !== -1) {
    const end = findClosingBrace(reply, start);
    if (end !== -1) {
      try {
        const parsed: unknown = JSON.parse(reply.slice(start, end + 1));
        if (isJsonObject(parsed)) return parsed;
      } catch {
        // Not valid JSON from this brace; try the next one
      }
    }
    start = reply.indexOf('{', start + 1);
  }

  return null;
}

function clampSpan(value: string | null): string | null {
  return value === null ? null : cleanFieldValue(value.slice(0, MAX_REFINED_SPAN_CHARS));
}

/**
 * Merge a model reply into the current record.
 * Returns null when the reply holds no usable object or no anchor value.
 */
export function applyRefinement(current: JourneyRecord, reply: string): JourneyRecord | null {
  const parsed = findFirstJsonObject(reply);
  if (!parsed) return null;

  const proposed: JourneyFields = {
    journey_id: cleanFieldValue(parsed.journey_id),
    score: cleanFieldValue(parsed.score),
    reason: clampSpan(cleanFieldValue(parsed.reason)),
    solution: clampSpan(cleanFieldValue(parsed.solution)),
  };

  if (proposed.journey_id === null && proposed.score === null) {
    return null;
  }

  return buildRecord(
    {
      journey_id: proposed.journey_id ?? current.journey_id,
      score: proposed.score ?? current.score,
      reason: proposed.reason ?? current.reason,
      solution: proposed.solution ?? current.solution,
    },
    'llm'
  );
}

function settle(current: JourneyRecord, reply: string): JourneyRecord {
  if (reply.trim() === '') {
    logger.warn('LLM refinement returned an empty reply, keeping fallback record');
    return current;
  }

  const refined = applyRefinement(current, reply);
  if (!refined) {
    logger.warn('LLM refinement reply had no usable JSON object, keeping fallback record', {
      reply_length: reply.length,
    });
    return current;
  }

  logger.info('LLM refinement accepted', {
    prompt_version: REFINEMENT_PROMPT_VERSION,
    journey_id_found: refined.journey_id !== null,
    score_found: refined.score !== null,
  });
  return refined;
}

/**
 * Refine a low-confidence record with a synchronous predictor.
 */
export function refine(text: string, current: JourneyRecord, predict: Predictor): JourneyRecord {
  const prompt = buildRefinementPrompt(text);

  let reply: unknown;
  try {
    reply = predict(prompt);
  } catch (error) {
    logger.warn('LLM refinement predictor failed, keeping fallback record', {
      error: error instanceof Error ? error.message : String(error),
    });
    return current;
  }

  if (typeof reply !== 'string') {
    logger.warn('LLM refinement predictor returned a non-string reply, keeping fallback record');
    return current;
  }

  return settle(current, reply);
}

/**
 * Refine a low-confidence record with a predictor that may return a promise.
 */
export async function refineAsync(
  text: string,
  current: JourneyRecord,
  predict: AsyncPredictor
): Promise<JourneyRecord> {
  const prompt = buildRefinementPrompt(text);

  let reply: unknown;
  try {
    reply = await predict(prompt);
  } catch (error) {
    logger.warn('LLM refinement predictor failed, keeping fallback record', {
      error: error instanceof Error ? error.message : String(error),
    });
    return current;
  }

  if (typeof reply !== 'string') {
    logger.warn('LLM refinement predictor returned a non-string reply, keeping fallback record');
    return current;
  }

  return settle(current, reply);
}
