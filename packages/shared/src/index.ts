/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runForSourceRow,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  extractionsCounter,
  extractionDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  batchRowsCounter,
  tagRowsCounter,
  dbQueryDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateJourneyRecord,
  validateExtractedEntry,
  compileSchema,
  runValidator,
  type ValidationResult,
} from './schemas';

// CSV
export { parseCsv, parseCsvRecords, type CsvRow } from './csv';

// Journey extraction pipeline
export * from './extractors';

// Agent tools
export * from './tools';
