/**
 * Journey Extraction Patterns
 *
 * Label aliases for the heuristic pass and keyword patterns for the fallback pass.
 *
 * Labelled text looks like:
 * "JourneyId: 12345"
 * "Score = -3.2"
 * "Reason - late arrival from previous leg"
 *
 * Unlabelled text only offers keywords:
 * "journey 789 had a severe issue, the reason was a late crew"
 */

import type { JourneyTextField } from '../types';
import { SPELLED_NUMBER_SOURCE } from './numeric';

// ============================================================================
// Heuristic (labelled) patterns
// ============================================================================

/**
 * Label aliases per field, as regex sources. Matching is case-insensitive and
 * anchored at the start of a line segment.
 */
export const FIELD_ALIASES: Record<JourneyTextField, string[]> = {
  journey_id: ['journey[\\s_-]?id', 'journey[\\s_-]?(?:number|num|no\\.?)', 'id'],
  score: ['journey[\\s_-]?score', 'score'],
  reason: ['raisonnement', 'raison', 'reason', 'cause'],
  solution: ['solution', 'resolution', 'remedy'],
};

/** ":" or "=" with optional spacing, or a dash with spaces on both sides */
const SEPARATOR_SOURCE = '(?:\\s*[:=]\\s*|\\s+-\\s+)';

function labelledPattern(aliases: string[]): RegExp {
  return new RegExp(`^\\s*(?:${aliases.join('|')})${SEPARATOR_SOURCE}(.*)$`, 'i');
}

export const LABELLED_FIELD_PATTERNS: Record<JourneyTextField, RegExp> = {
  journey_id: labelledPattern(FIELD_ALIASES.journey_id),
  score: labelledPattern(FIELD_ALIASES.score),
  reason: labelledPattern(FIELD_ALIASES.reason),
  solution: labelledPattern(FIELD_ALIASES.solution),
};

/** Delimiters that end a labelled value inside one line */
export const SEGMENT_DELIMITER_PATTERN = /[;|]/;

/** Inline declarations anywhere in the text, e.g. "... and score = -2.5 overall" */
export const INLINE_SCORE_PATTERN = /\bscore\s*[=:]\s*([-+−]?\d*\.?\d+)/i;
export const INLINE_JOURNEY_ID_PATTERN = /\bjourney[\s_-]?id\s*[=:]\s*([A-Za-z0-9][\w-]*)/i;

/** Quote characters stripped from both ends of a captured value */
export const SURROUNDING_QUOTES_PATTERN = /^["'`“”‘’]+|["'`“”‘’]+$/g;

// ============================================================================
// Fallback (keyword) patterns
// ============================================================================

/** Digits (3+) shortly after the word "journey" */
export const FALLBACK_JOURNEY_ID_PATTERN = /\bjourney[^0-9]{0,8}?([0-9]{3,})/i;

const SCORE_KEYWORD_SOURCE = '\\b(?:score|rating|grade)\\b';

/** Up to 24 characters that are neither digits, signs nor sentence boundaries */
const SCORE_GAP_SOURCE = '[^\\d+\\-\\u2212.!?;\\n]{0,24}?';

/** Numeric score near a score keyword; a leading sign word and a unit stay in the raw text */
export const FALLBACK_NUMERIC_SCORE_PATTERN = new RegExp(
  `${SCORE_KEYWORD_SOURCE}${SCORE_GAP_SOURCE}((?:\\b(?:minus|negative|plus)\\s+)?[-+\\u2212]?\\d*\\.?\\d+(?:\\s*(?:pts|points|%))?)`,
  'i'
);

/** Spelled-out score near a score keyword ("score was roughly minus two") */
export const FALLBACK_SPELLED_SCORE_PATTERN = new RegExp(
  `${SCORE_KEYWORD_SOURCE}${SCORE_GAP_SOURCE}\\b(${SPELLED_NUMBER_SOURCE})\\b`,
  'i'
);

export const REASON_KEYWORD_PATTERN = /\b(?:reason|because|raison|cause|due to)\b/i;
export const SOLUTION_KEYWORD_PATTERN = /\b(?:solution|fix|recommend|recommendation|proposed|resolve)\b/i;

/**
 * Clause boundaries: newlines, ; ! ? and any . or , that is not between two digits.
 */
export const CLAUSE_BOUNDARY_PATTERN = /[\n;!?]|[.,](?!\d)|(?<!\d)[.,]/;

/** Longest span the fallback pass keeps for reason/solution */
export const MAX_FALLBACK_SPAN_CHARS = 200;
