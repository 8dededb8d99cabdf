/**
 * Query API application
 *
 * Read-only API over extracted journey records.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  type ErrorCode,
  type ErrorEnvelope,
} from '@journey-extractor/shared';
import { parseJourneyQuery, selectJourneys, QueryValidationError } from './lib/query';
import { readJourneyEntries, JourneyStoreNotFoundError } from './lib/store';

export interface QueryApiOptions {
  /** JSONL file written by the batch extractor */
  outputPath?: string;
  /** Upper bound for `limit` */
  maxResults?: number;
}

function getCorrelationHeader(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : '';
}

function sendError(res: Response, status: number, code: ErrorCode, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: getCorrelationHeader(res),
    },
  };
  res.status(status).json(error);
}

export function createApp(options: QueryApiOptions = {}): Express {
  const outputPath = options.outputPath ?? config.outputPath;
  const maxResults = options.maxResults ?? config.maxResults;

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path, status });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'query-api',
      output_path: outputPath,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * GET /api/journeys
   * Query params: top, bottom, limit, journey_id, min_confidence
   */
  app.get('/api/journeys', async (req: Request, res: Response) => {
    try {
      const query = parseJourneyQuery(req.query, maxResults);
      const entries = await readJourneyEntries(outputPath);
      res.json(selectJourneys(entries, query));
    } catch (error) {
      if (error instanceof QueryValidationError) {
        sendError(res, 400, 'invalid_request', error.message);
        return;
      }
      if (error instanceof JourneyStoreNotFoundError) {
        sendError(res, 404, 'not_found', 'No extracted journeys available');
        return;
      }

      logger.error('Failed to read journeys', error, { output_path: outputPath });
      sendError(res, 500, 'internal_error', 'Failed to retrieve journeys');
    }
  });

  // Unknown routes
  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `Route ${req.method} ${req.path} not found`);
  });

  return app;
}
