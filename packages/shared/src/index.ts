/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  extractionsCounter,
  extractionDurationHistogram,
  documentsRenderedCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateRecord, validateContractForm, schemas, type ValidationResult } from './schemas';

// Text extraction
export { extractTextFromPdf, type TextExtractor } from './pdf';

// Contract extractors (dual-strategy extraction core)
export * from './extractors';
