/**
 * Base Contract Extractor
 *
 * Abstract base class providing logging and metrics around a strategy's
 * field extraction.
 */

import type { ExtractionMode, NormalizedRecord } from '../types';
import type { ContractStrategy } from './types';
import { logger } from '../logger';
import { extractionDurationHistogram } from '../metrics';

export abstract class BaseExtractor implements ContractStrategy {
  abstract readonly mode: ExtractionMode;
  abstract readonly description: string;

  /**
   * Strategy-specific field extraction over the full text.
   */
  protected abstract extractFields(text: string): Promise<NormalizedRecord>;

  async extract(text: string): Promise<NormalizedRecord> {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      extraction_mode: this.mode,
      text_length: text.length,
    });

    try {
      const record = await this.extractFields(text);

      const durationMs = Date.now() - startTime;
      extractionDurationHistogram.observe({ extraction_mode: this.mode }, durationMs / 1000);

      logger.info('Extraction complete', {
        extraction_mode: this.mode,
        line_item_count: record.line_items.length,
        duration_ms: durationMs,
      });

      return record;
    } catch (error) {
      logger.error('Extraction failed', error, {
        extraction_mode: this.mode,
      });
      throw error;
    }
  }
}

/**
 * First capture group of the first match, trimmed.
 */
export function firstGroup(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  const value = match?.[1];
  return value === undefined ? null : value.trim();
}
