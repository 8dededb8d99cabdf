/**
 * Heuristic Journey Extraction
 *
 * Scans for explicit "key: value" declarations. Only the anchor fields
 * (journey_id, score) can make this pass sufficient; a text that merely has a
 * "Reason:" line still goes through the fallback pass.
 */

import {
  JOURNEY_TEXT_FIELDS,
  type JourneyFields,
  type JourneyTextField,
} from '../types';
import {
  LABELLED_FIELD_PATTERNS,
  SEGMENT_DELIMITER_PATTERN,
  INLINE_SCORE_PATTERN,
  INLINE_JOURNEY_ID_PATTERN,
  SURROUNDING_QUOTES_PATTERN,
} from './patterns';
import { buildRecord, cleanFieldValue, EMPTY_FIELDS } from './record';
import type { HeuristicResult } from './types';
import { logger } from '../logger';

export const ANCHOR_FIELDS: readonly JourneyTextField[] = ['journey_id', 'score'];

/**
 * Trim whitespace and surrounding quotes from a captured value.
 */
export function cleanLabelledValue(raw: string): string | null {
  return cleanFieldValue(raw.trim().replace(SURROUNDING_QUOTES_PATTERN, ''));
}

/**
 * Match one line segment against every field's label pattern.
 */
function matchSegment(segment: string): { field: JourneyTextField; value: string } | null {
  for (const field of JOURNEY_TEXT_FIELDS) {
    const match = segment.match(LABELLED_FIELD_PATTERNS[field]);
    if (match) {
      const value = cleanLabelledValue(match[1]);
      if (value !== null) {
        return { field, value };
      }
    }
  }
  return null;
}

/**
 * Collect labelled fields. The first declaration of a field wins.
 */
export function scanLabelledFields(text: string): JourneyFields {
  const fields: JourneyFields = { ...EMPTY_FIELDS };

  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  for (const line of lines) {
    for (const segment of line.split(SEGMENT_DELIMITER_PATTERN)) {
      const found = matchSegment(segment);
      if (found && fields[found.field] === null) {
        fields[found.field] = found.value;
      }
    }
  }

  // Inline declarations inside prose, e.g. "... overall score = -2.5 for the leg"
  if (fields.score === null) {
    const inline = text.match(INLINE_SCORE_PATTERN);
    if (inline) fields.score = inline[1];
  }
  if (fields.journey_id === null) {
    const inline = text.match(INLINE_JOURNEY_ID_PATTERN);
    if (inline) fields.journey_id = inline[1];
  }

  return fields;
}

/**
 * Check whether at least one anchor field was populated
 */
export function hasAnchorField(fields: JourneyFields): boolean {
  return ANCHOR_FIELDS.some((field) => fields[field] !== null);
}

/**
 * Run the heuristic pass.
 */
export function extractHeuristic(text: string): HeuristicResult {
  const fields = scanLabelledFields(text);

  if (!hasAnchorField(fields)) {
    logger.debug('Heuristic extraction found no anchor field', {
      labelled_reason: fields.reason !== null,
      labelled_solution: fields.solution !== null,
    });
    return { sufficient: false, record: buildRecord(EMPTY_FIELDS, 'low') };
  }

  logger.debug('Heuristic extraction succeeded', {
    fields_found: JOURNEY_TEXT_FIELDS.filter((field) => fields[field] !== null),
  });

  return { sufficient: true, record: buildRecord(fields, 'heuristic') };
}
