/**
 * Journey Extraction Pipeline
 *
 * start → heuristic_attempt → {finalized | fallback_attempt}
 *       → {finalized | llm_attempt} → finalized
 *
 * Deterministic passes run first; the predictor is only consulted for a
 * low-confidence fallback record, and at most once.
 */

import type { JourneyRecord } from '../types';
import type { AsyncPredictor, Predictor, SettledDecision } from './types';
import { extractHeuristic } from './heuristic';
import { extractFallback } from './fallback';
import { classifyConfidence } from './confidence';
import { refine, refineAsync } from './llm-refiner';
import { assertExtractionText, normalizeRecord, serializeRecord } from './record';
import { logger } from '../logger';
import { extractionsCounter, extractionDurationHistogram } from '../metrics';

/**
 * Heuristic and fallback passes, ending in a settled decision.
 */
function runDeterministicStages(text: string, hasPredictor: boolean): SettledDecision {
  const heuristic = extractHeuristic(text);

  const first = classifyConfidence({ heuristic, hasPredictor });
  if (first.next !== 'fallback') {
    return first;
  }

  logger.debug('Heuristic extraction insufficient, falling back to keyword scan', {
    text_length: text.length,
  });

  const fallback = extractFallback(text);
  return classifyConfidence({ heuristic, fallback, hasPredictor });
}

function finalize(record: JourneyRecord, startTime: number): JourneyRecord {
  const finalRecord = normalizeRecord(record);
  const durationMs = Date.now() - startTime;

  extractionsCounter.inc({ confidence: finalRecord.confidence });
  extractionDurationHistogram.observe({ confidence: finalRecord.confidence }, durationMs / 1000);

  logger.debug('Extraction complete', {
    confidence: finalRecord.confidence,
    journey_id: finalRecord.journey_id,
    duration_ms: durationMs,
  });

  return finalRecord;
}

/**
 * Extract a journey record from free text.
 *
 * @throws InvalidExtractionInputError when `text` is not a string
 */
export function extractJourneyRecord(text: unknown, predict?: Predictor): JourneyRecord {
  assertExtractionText(text);
  const startTime = Date.now();

  const decision = runDeterministicStages(text, predict !== undefined);

  if (decision.next === 'refine' && predict) {
    return finalize(refine(text, decision.record, predict), startTime);
  }

  return finalize(decision.record, startTime);
}

/**
 * Same pipeline as {@link extractJourneyRecord}, awaiting a predictor that may
 * answer asynchronously.
 */
export async function extractJourneyRecordAsync(
  text: unknown,
  predict?: AsyncPredictor
): Promise<JourneyRecord> {
  assertExtractionText(text);
  const startTime = Date.now();

  const decision = runDeterministicStages(text, predict !== undefined);

  if (decision.next === 'refine' && predict) {
    return finalize(await refineAsync(text, decision.record, predict), startTime);
  }

  return finalize(decision.record, startTime);
}

/**
 * Extract journey information and return it as canonical JSON:
 * {"journey_id", "score", "score_numeric", "reason", "solution", "confidence"}
 */
export function extractJourneyInfo(text: unknown, predict?: Predictor): string {
  return serializeRecord(extractJourneyRecord(text, predict));
}

export async function extractJourneyInfoAsync(
  text: unknown,
  predict?: AsyncPredictor
): Promise<string> {
  return serializeRecord(await extractJourneyRecordAsync(text, predict));
}
