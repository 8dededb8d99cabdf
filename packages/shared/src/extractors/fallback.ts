/**
 * Fallback Journey Extraction
 *
 * Keyword-proximity scan used when no labelled anchor field exists. It only
 * copies short spans that are actually in the text and always tags the result
 * 'low'.
 */

import type { JourneyFields, JourneyRecord } from '../types';
import {
  FALLBACK_JOURNEY_ID_PATTERN,
  FALLBACK_NUMERIC_SCORE_PATTERN,
  FALLBACK_SPELLED_SCORE_PATTERN,
  REASON_KEYWORD_PATTERN,
  SOLUTION_KEYWORD_PATTERN,
  CLAUSE_BOUNDARY_PATTERN,
  MAX_FALLBACK_SPAN_CHARS,
} from './patterns';
import { buildRecord } from './record';
import { logger } from '../logger';

/**
 * Split text into trimmed, non-empty clauses.
 */
export function splitClauses(text: string): string[] {
  return text
    .split(CLAUSE_BOUNDARY_PATTERN)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

/**
 * First clause containing the keyword, capped to the maximum span length.
 */
export function findKeywordClause(clauses: string[], keyword: RegExp): string | null {
  const clause = clauses.find((c) => keyword.test(c));
  if (!clause) return null;
  return clause.slice(0, MAX_FALLBACK_SPAN_CHARS).trim();
}

function findJourneyId(text: string): string | null {
  const match = text.match(FALLBACK_JOURNEY_ID_PATTERN);
  return match ? match[1] : null;
}

function findScore(text: string): string | null {
  const numeric = text.match(FALLBACK_NUMERIC_SCORE_PATTERN);
  if (numeric) return numeric[1];

  const spelled = text.match(FALLBACK_SPELLED_SCORE_PATTERN);
  return spelled ? spelled[1] : null;
}

/**
 * Best-effort fields from keyword proximity.
 */
export function scanKeywordFields(text: string): JourneyFields {
  const clauses = splitClauses(text);

  return {
    journey_id: findJourneyId(text),
    score: findScore(text),
    reason: findKeywordClause(clauses, REASON_KEYWORD_PATTERN),
    solution: findKeywordClause(clauses, SOLUTION_KEYWORD_PATTERN),
  };
}

/**
 * Run the fallback pass. The record is always tagged 'low'.
 */
export function extractFallback(text: string): JourneyRecord {
  const record = buildRecord(scanKeywordFields(text), 'low');

  logger.debug('Fallback extraction complete', {
    journey_id_found: record.journey_id !== null,
    score_found: record.score !== null,
    reason_found: record.reason !== null,
    solution_found: record.solution !== null,
  });

  return record;
}
