/**
 * Journey Extractor Types
 *
 * Defines the stage contracts of the extraction pipeline:
 * heuristic → (fallback) → (refinement) → validated record.
 */

import type { JourneyRecord } from '../types';

/**
 * Synchronous predictor: maps a prompt to the model's raw reply.
 * Called at most once per extraction.
 */
export type Predictor = (prompt: string) => string;

/**
 * Predictor that may answer asynchronously (network-backed models).
 */
export type AsyncPredictor = (prompt: string) => string | Promise<string>;

/**
 * Result of the heuristic pass. When `sufficient` is false the record is all
 * nulls and the pipeline moves on to the fallback pass.
 */
export interface HeuristicResult {
  sufficient: boolean;
  record: JourneyRecord;
}

export interface ClassifierInput {
  heuristic: HeuristicResult;
  /** Fallback record, once the fallback pass has run */
  fallback?: JourneyRecord;
  /** Whether the caller supplied a predictor */
  hasPredictor: boolean;
}

/**
 * What the pipeline does next:
 * - 'finalize': return `record` as is
 * - 'fallback': run the keyword fallback pass
 * - 'refine': hand `record` to the LLM refiner
 */
export type ConfidenceDecision =
  | { next: 'finalize'; record: JourneyRecord }
  | { next: 'fallback' }
  | { next: 'refine'; record: JourneyRecord };

/** Decision once the fallback pass has run */
export type SettledDecision = Exclude<ConfidenceDecision, { next: 'fallback' }>;
