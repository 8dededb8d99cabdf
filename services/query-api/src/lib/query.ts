/**
 * Journey query parsing and selection.
 */

import {
  config,
  CONFIDENCE_LEVELS,
  type Confidence,
  type ExtractedEntry,
  type JourneyQuery,
} from '@journey-extractor/shared';

/** Ordering used by `min_confidence`: low < llm < heuristic */
export const CONFIDENCE_RANK: Record<Confidence, number> = {
  low: 0,
  llm: 1,
  heuristic: 2,
};

export class QueryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

function isConfidence(value: string): value is Confidence {
  return CONFIDENCE_LEVELS.some((level) => level === value);
}

function readString(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new QueryValidationError(`${name} must be given once`);
  }
  return value;
}

function readCount(params: Record<string, unknown>, name: string): number {
  const value = readString(params, name);
  if (value === undefined || value === '') {
    return 0;
  }
  if (!/^\d+$/.test(value)) {
    throw new QueryValidationError(`${name} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}

/**
 * Parse query-string parameters. Counts of 0 mean "not set"; `limit` is
 * capped at `maxResults`.
 *
 * @throws QueryValidationError on malformed values
 */
export function parseJourneyQuery(
  params: Record<string, unknown>,
  maxResults: number = config.maxResults
): JourneyQuery {
  const top = readCount(params, 'top');
  const bottom = readCount(params, 'bottom');
  const limit = readCount(params, 'limit');

  const query: JourneyQuery = {
    top,
    bottom,
    limit: limit > 0 ? Math.min(limit, maxResults) : maxResults,
  };

  const journeyId = readString(params, 'journey_id')?.trim();
  if (journeyId) {
    query.journeyId = journeyId;
  }

  const minConfidence = readString(params, 'min_confidence')?.trim();
  if (minConfidence) {
    if (!isConfidence(minConfidence)) {
      throw new QueryValidationError(
        `min_confidence must be one of: ${CONFIDENCE_LEVELS.join(', ')}`
      );
    }
    query.minConfidence = minConfidence;
  }

  return query;
}

function compareScores(a: ExtractedEntry, b: ExtractedEntry, direction: 1 | -1): number {
  const left = a.extracted.score_numeric;
  const right = b.extracted.score_numeric;
  if (left === null && right === null) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return (left - right) * direction;
}

/**
 * Filter, sort and cut entries. `top` wins over `bottom`; without either the
 * result is sorted highest score first. Entries without a numeric score
 * always sort last.
 */
export function selectJourneys(entries: ExtractedEntry[], query: JourneyQuery): ExtractedEntry[] {
  const { journeyId, minConfidence } = query;

  const filtered = entries.filter((entry) => {
    if (
      journeyId !== undefined &&
      entry.source_id !== journeyId &&
      entry.extracted.journey_id !== journeyId
    ) {
      return false;
    }
    if (
      minConfidence !== undefined &&
      CONFIDENCE_RANK[entry.extracted.confidence] < CONFIDENCE_RANK[minConfidence]
    ) {
      return false;
    }
    return true;
  });

  let result: ExtractedEntry[];
  if (query.top > 0) {
    result = [...filtered].sort((a, b) => compareScores(a, b, -1)).slice(0, query.top);
  } else if (query.bottom > 0) {
    result = [...filtered].sort((a, b) => compareScores(a, b, 1)).slice(0, query.bottom);
  } else {
    result = [...filtered].sort((a, b) => compareScores(a, b, -1));
  }

  return result.slice(0, query.limit);
}
