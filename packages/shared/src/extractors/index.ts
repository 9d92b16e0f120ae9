/**
 * Contract Extractors
 *
 * Dual-strategy extraction: anchored patterns for the known contract template,
 * entity tagging for unknown layouts.
 */

export {
  type ContractStrategy,
  type EntityTagger,
  type TaggedEntity,
  EntityTaggerUnavailableError,
  UnknownExtractionModeError,
} from './types';

export { BaseExtractor, firstGroup } from './base-extractor';

export { ContractExtractor, type ContractExtractorOptions } from './dispatcher';

// Pattern strategy
export {
  PatternExtractor,
  PATTERN_VERSION,
  extractPartySection,
  extractPartyFields,
  extractEmail,
  extractLineItems,
  extractEventDetails,
  stripCurrency,
  type EventDetails,
} from './pattern';

// Statistical strategy
export {
  StatisticalExtractor,
  TransformersEntityTagger,
  loadEntityTagger,
  aggregateTokens,
  splitIntoChunks,
  toTokenPredictions,
  type TokenPrediction,
  type TokenClassifier,
} from './statistical';
