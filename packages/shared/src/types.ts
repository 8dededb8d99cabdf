/**
 * Shared TypeScript Types
 *
 * Types for the journey extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Journey Record
// ============================================================================

/**
 * Provenance of a record's values:
 * - 'heuristic': explicit labelled fields found in the text
 * - 'low': best-effort keyword spans (fallback), possibly after a failed refinement
 * - 'llm': values merged from a parsed language-model reply
 */
export type Confidence = 'heuristic' | 'low' | 'llm';

export const CONFIDENCE_LEVELS: readonly Confidence[] = ['heuristic', 'low', 'llm'];

/** The four textual fields every extraction stage works on */
export interface JourneyFields {
  journey_id: string | null;
  score: string | null;
  reason: string | null;
  solution: string | null;
}

export type JourneyTextField = keyof JourneyFields;

export const JOURNEY_TEXT_FIELDS: readonly JourneyTextField[] = [
  'journey_id',
  'score',
  'reason',
  'solution',
];

/**
 * Canonical extraction output. Key order here is the serialized order.
 */
export interface JourneyRecord {
  readonly journey_id: string | null;
  readonly score: string | null;
  readonly score_numeric: number | null;
  readonly reason: string | null;
  readonly solution: string | null;
  readonly confidence: Confidence;
}

// ============================================================================
// Batch Output
// ============================================================================

/** One JSON line written by the batch extractor */
export interface ExtractedEntry {
  source_id: string | null;
  extracted: JourneyRecord;
}

// ============================================================================
// API Types
// ============================================================================

export type ErrorCode = 'invalid_request' | 'not_found' | 'internal_error';

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    correlation_id: string;
  };
}

export interface JourneyQuery {
  top: number;
  bottom: number;
  limit: number;
  journeyId?: string;
  minConfidence?: Confidence;
}
