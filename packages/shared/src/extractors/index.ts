/**
 * Journey Extractors Module
 *
 * Deterministic-first extraction pipeline:
 * - heuristic: explicit labelled fields (confidence 'heuristic')
 * - fallback: keyword-proximity spans (confidence 'low')
 * - refinement: optional single predictor call (confidence 'llm')
 */

// Core types
export type {
  Predictor,
  AsyncPredictor,
  HeuristicResult,
  ClassifierInput,
  ConfidenceDecision,
  SettledDecision,
} from './types';

// Stages
export { parseScoreNumeric, NUMERIC_TOKEN_PATTERN } from './numeric';
export {
  extractHeuristic,
  scanLabelledFields,
  cleanLabelledValue,
  hasAnchorField,
  ANCHOR_FIELDS,
} from './heuristic';
export { extractFallback, scanKeywordFields, splitClauses, findKeywordClause } from './fallback';
export { classifyConfidence } from './confidence';
export {
  refine,
  refineAsync,
  applyRefinement,
  buildRefinementPrompt,
  findFirstJsonObject,
  REFINEMENT_PROMPT_VERSION,
  MAX_REFINED_SPAN_CHARS,
} from './llm-refiner';
export {
  buildRecord,
  normalizeRecord,
  serializeRecord,
  cleanFieldValue,
  assertExtractionText,
  InvalidExtractionInputError,
  EMPTY_FIELDS,
} from './record';

// Entry points
export {
  extractJourneyInfo,
  extractJourneyInfoAsync,
  extractJourneyRecord,
  extractJourneyRecordAsync,
} from './pipeline';

// Predictors
export {
  createOpenAiPredictor,
  type OpenAiPredictorOptions,
  type ChatCompletionClient,
} from './openai-predictor';
