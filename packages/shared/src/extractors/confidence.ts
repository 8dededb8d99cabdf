/**
 * Confidence Classification
 *
 * Pure routing decision between pipeline stages. A sufficient heuristic pass
 * is final; otherwise the fallback record is final unless a predictor exists,
 * in which case it becomes a refinement candidate.
 */

import type { ClassifierInput, ConfidenceDecision, SettledDecision } from './types';
import type { JourneyRecord } from '../types';

export function classifyConfidence(input: ClassifierInput & { fallback: JourneyRecord }): SettledDecision;
export function classifyConfidence(input: ClassifierInput): ConfidenceDecision;
export function classifyConfidence(input: ClassifierInput): ConfidenceDecision {
  const { heuristic, fallback, hasPredictor } = input;

  if (heuristic.sufficient) {
    return { next: 'finalize', record: heuristic.record };
  }

  if (!fallback) {
    return { next: 'fallback' };
  }

  if (hasPredictor) {
    return { next: 'refine', record: fallback };
  }

  return { next: 'finalize', record: fallback };
}
