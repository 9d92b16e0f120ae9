/**
 * Contract Extraction Dispatcher
 *
 * The single entry point of the extraction core: reads the document text,
 * then routes it to the strategy for the requested mode.
 */

import type { ExtractionMode, NormalizedRecord } from '../types';
import { EXTRACTION_MODES } from '../types';
import type { ContractStrategy, EntityTagger } from './types';
import { EntityTaggerUnavailableError, UnknownExtractionModeError } from './types';
import { PatternExtractor } from './pattern';
import { StatisticalExtractor } from './statistical';
import { extractTextFromPdf, type TextExtractor } from '../pdf';
import { logger } from '../logger';
import { extractionsCounter } from '../metrics';

export interface ContractExtractorOptions {
  /** Required only for statistical extraction */
  tagger?: EntityTagger | null;
  /** Defaults to the pdfjs text extractor */
  textExtractor?: TextExtractor;
}

export class ContractExtractor {
  private readonly strategies = new Map<ExtractionMode, ContractStrategy>();
  private readonly textExtractor: TextExtractor;

  constructor(options: ContractExtractorOptions = {}) {
    this.textExtractor = options.textExtractor ?? extractTextFromPdf;

    this.strategies.set('pattern', new PatternExtractor());
    if (options.tagger) {
      this.strategies.set('statistical', new StatisticalExtractor(options.tagger));
    }
  }

  /**
   * Modes this extractor can serve with its current dependencies.
   */
  availableModes(): ExtractionMode[] {
    return Array.from(this.strategies.keys());
  }

  /**
   * Extract a Normalized Record from document bytes.
   *
   * @returns null when the document yields no text
   * @throws UnknownExtractionModeError for a mode outside ExtractionMode
   * @throws EntityTaggerUnavailableError for statistical mode without a tagger
   */
  async extract(bytes: Uint8Array, mode: ExtractionMode = 'statistical'): Promise<NormalizedRecord | null> {
    if (!EXTRACTION_MODES.includes(mode)) {
      throw new UnknownExtractionModeError(mode);
    }

    const text = await this.textExtractor(bytes);

    if (!text) {
      logger.warn('No text extracted from document, skipping extraction', {
        extraction_mode: mode,
        byte_length: bytes.byteLength,
      });
      extractionsCounter.inc({ extraction_mode: mode, status: 'no_text' });
      return null;
    }

    // Pattern is always registered; only statistical can be missing
    const strategy = this.strategies.get(mode);
    if (!strategy) {
      extractionsCounter.inc({ extraction_mode: mode, status: 'unavailable' });
      throw new EntityTaggerUnavailableError();
    }

    try {
      const record = await strategy.extract(text);
      extractionsCounter.inc({ extraction_mode: mode, status: 'success' });
      return record;
    } catch (error) {
      extractionsCounter.inc({ extraction_mode: mode, status: 'failed' });
      throw error;
    }
  }
}
