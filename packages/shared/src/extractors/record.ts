/**
 * Journey Record Validation & Serialization
 *
 * Every stage funnels its output through here so the returned record always has
 * exactly six keys in a fixed order with the right nullability.
 */

import {
  CONFIDENCE_LEVELS,
  type Confidence,
  type JourneyFields,
  type JourneyRecord,
} from '../types';
import { parseScoreNumeric } from './numeric';

/**
 * Raised when the pipeline is called with something other than a string.
 * This is the only error the pipeline lets escape.
 */
export class InvalidExtractionInputError extends TypeError {
  constructor(received: unknown) {
    super(`Journey extraction expects a string, received ${received === null ? 'null' : typeof received}`);
    this.name = 'InvalidExtractionInputError';
  }
}

export function assertExtractionText(text: unknown): asserts text is string {
  if (typeof text !== 'string') {
    throw new InvalidExtractionInputError(text);
  }
}

export const EMPTY_FIELDS: Readonly<JourneyFields> = Object.freeze({
  journey_id: null,
  score: null,
  reason: null,
  solution: null,
});

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfidence(value: unknown): value is Confidence {
  return CONFIDENCE_LEVELS.some((level) => level === value);
}

/**
 * Trim a field value; empty strings become null, finite numbers become strings.
 */
export function cleanFieldValue(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Build a frozen record from the four text fields.
 * `score_numeric` is always derived from `score`.
 */
export function buildRecord(fields: Partial<JourneyFields>, confidence: Confidence): JourneyRecord {
  const score = cleanFieldValue(fields.score);
  return Object.freeze({
    journey_id: cleanFieldValue(fields.journey_id),
    score,
    score_numeric: parseScoreNumeric(score),
    reason: cleanFieldValue(fields.reason),
    solution: cleanFieldValue(fields.solution),
    confidence,
  });
}

/**
 * Normalize any candidate object to the canonical record shape.
 * Missing keys become null and unknown confidence values become 'low'.
 */
export function normalizeRecord(candidate: unknown): JourneyRecord {
  if (!isRecordLike(candidate)) {
    return buildRecord(EMPTY_FIELDS, 'low');
  }

  const confidence = isConfidence(candidate.confidence) ? candidate.confidence : 'low';

  return buildRecord(
    {
      journey_id: cleanFieldValue(candidate.journey_id),
      score: cleanFieldValue(candidate.score),
      reason: cleanFieldValue(candidate.reason),
      solution: cleanFieldValue(candidate.solution),
    },
    confidence
  );
}

/**
 * Render a record as JSON with the canonical key order.
 */
export function serializeRecord(record: JourneyRecord): string {
  const ordered: JourneyRecord = {
    journey_id: record.journey_id,
    score: record.score,
    score_numeric: record.score_numeric,
    reason: record.reason,
    solution: record.solution,
    confidence: record.confidence,
  };
  return JSON.stringify(ordered);
}
