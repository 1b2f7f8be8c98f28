/**
 * Prometheus Metrics
 *
 * Metrics for monitoring parameter extraction, upstream capabilities, and HTTP traffic.
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

export const parameterExtractionsCounter = new promClient.Counter({
  name: 'risklens_parameter_extractions_total',
  help: 'Total number of parameter extractions',
  labelNames: ['category', 'status', 'method'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'risklens_extraction_duration_seconds',
  help: 'Duration of a document extraction run',
  labelNames: ['pipeline'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const salesExtractionsCounter = new promClient.Counter({
  name: 'risklens_sales_extractions_total',
  help: 'Total number of GSTR-3B sales extractions',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// Parse Cache Metrics
// ============================================================================

export const cacheLookupsCounter = new promClient.Counter({
  name: 'risklens_parse_cache_lookups_total',
  help: 'Parse cache lookups by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

// ============================================================================
// Upstream Capability Metrics
// ============================================================================

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'risklens_embedding_requests_total',
  help: 'Total number of embedding batch requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'risklens_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'risklens_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const documentConversionsCounter = new promClient.Counter({
  name: 'risklens_document_conversions_total',
  help: 'Total number of document conversion requests',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'risklens_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'risklens_http_requests_total',
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
