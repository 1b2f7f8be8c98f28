/**
 * Extraction API
 *
 * POST /extract          - Extract parameters from uploaded (base64) documents
 * POST /extract/parsed   - Extract parameters from already converted documents
 * GET  /cache/stats      - Parse cache statistics
 * DELETE /cache          - Clear the parse cache
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isPipelineError,
  InvalidInputError,
  errorMessage,
  type ErrorEnvelope,
  type ParseCache,
} from '@risklens/shared';
import type { ExtractionPipeline } from './lib/pipeline';
import { parseExtractParsedRequest, parseExtractRequest } from './lib/request';

export interface AppDependencies {
  pipeline: ExtractionPipeline;
  cache: ParseCache | null;
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : '';
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function sendError(res: Response, status: number, code: string, message: string, details?: string[]): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
      ...(details && details.length > 0 ? { details } : {}),
    },
  };
  res.status(status).json(envelope);
}

function handleError(res: Response, error: unknown, action: string): void {
  if (isPipelineError(error)) {
    const details = error instanceof InvalidInputError ? error.details : undefined;
    if (error.httpStatus >= 500) {
      logger.error(`${action} failed`, error, { code: error.code });
    } else {
      logger.warn(`${action} rejected`, { code: error.code, error: error.message });
    }
    sendError(res, error.httpStatus, error.code, error.message, details);
    return;
  }

  logger.error(`${action} failed`, error);
  sendError(res, 500, 'internal_error', `${action} failed`);
}

export function createApp(deps: AppDependencies): express.Express {
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
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.use(express.json({ limit: config.maxRequestBody }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extraction-api',
      parse_cache: deps.cache ? 'enabled' : 'disabled',
      rag: config.enableRag ? 'enabled' : 'disabled',
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /extract
   * Bureau report and GSTR-3B return uploaded as base64, converted through the parse cache
   */
  app.post('/extract', async (req: Request, res: Response) => {
    try {
      const request = parseExtractRequest(req.body);
      const response = await deps.pipeline.runUploaded(request.bureauDocument, request.gstDocument, request.parameters);
      res.json(response);
    } catch (error) {
      handleError(res, error, 'Extraction');
    }
  });

  /**
   * POST /extract/parsed
   * Documents already converted to the ParsedDocument shape
   */
  app.post('/extract/parsed', async (req: Request, res: Response) => {
    try {
      const request = parseExtractParsedRequest(req.body);
      const response = await deps.pipeline.runParsed(request.bureauDocument, request.gstDocument, request.parameters);
      res.json(response);
    } catch (error) {
      handleError(res, error, 'Extraction');
    }
  });

  app.get('/cache/stats', async (req: Request, res: Response) => {
    if (!deps.cache) {
      sendError(res, 404, 'cache_disabled', 'Parse cache is disabled');
      return;
    }
    try {
      const stats = await deps.cache.stats();
      res.json({
        cache_dir: stats.cacheDir,
        total_files: stats.totalFiles,
        total_size_bytes: stats.totalSizeBytes,
        total_size_mb: stats.totalSizeMb,
      });
    } catch (error) {
      handleError(res, error, 'Cache stats');
    }
  });

  app.delete('/cache', async (req: Request, res: Response) => {
    if (!deps.cache) {
      sendError(res, 404, 'cache_disabled', 'Parse cache is disabled');
      return;
    }
    try {
      const deleted = await deps.cache.clear();
      res.json({ deleted });
    } catch (error) {
      handleError(res, error, 'Cache clear');
    }
  });

  // Body parser and other middleware errors
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status !== undefined && status >= 400 && status < 500) {
      sendError(res, status, 'invalid_input', `Invalid input: ${errorMessage(error)}`);
      return;
    }
    handleError(res, error, 'Request');
  });

  return app;
}
