/**
 * Prometheus Metrics
 *
 * Metrics for monitoring extraction, rendering, and HTTP traffic.
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
  name: 'contracts_extractions_total',
  help: 'Total number of extraction calls',
  labelNames: ['extraction_mode', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'contracts_extraction_duration_seconds',
  help: 'Duration of strategy extraction over document text',
  labelNames: ['extraction_mode'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

// ============================================================================
// Rendering Metrics
// ============================================================================

export const documentsRenderedCounter = new promClient.Counter({
  name: 'contracts_documents_rendered_total',
  help: 'Total number of documents rendered',
  labelNames: ['kind', 'format', 'status'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'contracts_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'contracts_http_requests_total',
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
