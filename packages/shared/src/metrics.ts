/**
 * Prometheus Metrics
 *
 * Metrics for extraction outcomes, LLM refinement, batch runs and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionsCounter = new promClient.Counter({
  name: 'journey_extractions_total',
  help: 'Total number of journey extractions by resulting confidence',
  labelNames: ['confidence'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'journey_extraction_duration_seconds',
  help: 'Duration of a single journey extraction',
  labelNames: ['confidence'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'journey_llm_requests_total',
  help: 'Total number of LLM refinement requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'journey_llm_request_duration_seconds',
  help: 'Duration of LLM refinement requests',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Batch & Tagging Metrics
// ============================================================================

export const batchRowsCounter = new promClient.Counter({
  name: 'journey_batch_rows_total',
  help: 'Total number of CSV rows processed by the batch extractor',
  labelNames: ['status'],
  registers: [register],
});

export const tagRowsCounter = new promClient.Counter({
  name: 'journey_tag_rows_total',
  help: 'Total number of tag rows applied to the journey database',
  labelNames: ['status'],
  registers: [register],
});

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'journey_db_query_duration_seconds',
  help: 'Duration of database operations',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'journey_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'journey_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
