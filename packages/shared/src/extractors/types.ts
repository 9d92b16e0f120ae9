/**
 * Contract Extractor Types
 *
 * Each extraction mode is served by one strategy that turns contract text
 * into a Normalized Record.
 */

import type { ExtractionMode, NormalizedRecord } from '../types';

/**
 * A named entity found by the tagger, e.g. { text: 'Maria Souza', type: 'PER' }.
 */
export interface TaggedEntity {
  text: string;
  type: string;
}

/**
 * Black-box named-entity tagger used by the statistical strategy.
 * Holds no state between calls.
 */
export interface EntityTagger {
  tag(text: string): Promise<TaggedEntity[]>;
}

/**
 * Interface for contract extraction strategies.
 */
export interface ContractStrategy {
  /** The mode this strategy serves */
  readonly mode: ExtractionMode;

  /** Human-readable description of what this strategy does */
  readonly description: string;

  /**
   * Extract a record from the full contract text.
   * Fields that cannot be found carry the strategy's sentinel.
   */
  extract(text: string): Promise<NormalizedRecord>;
}

/**
 * Raised when the statistical strategy is requested but no entity tagger was
 * loaded. This is a deployment defect, not a per-request condition.
 */
export class EntityTaggerUnavailableError extends Error {
  constructor(message = 'Entity tagging model is not loaded; statistical extraction is unavailable') {
    super(message);
    this.name = 'EntityTaggerUnavailableError';
  }
}

/**
 * Raised for a mode string outside ExtractionMode, e.g. from an untyped caller.
 */
export class UnknownExtractionModeError extends Error {
  constructor(readonly mode: string) {
    super(`Unknown extraction mode: ${mode}`);
    this.name = 'UnknownExtractionModeError';
  }
}
