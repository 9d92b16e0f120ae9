/**
 * Entity Tagger
 *
 * Adapts a transformers.js token-classification pipeline to the EntityTagger
 * interface. The model is loaded once per process from a provisioned local
 * directory and only read afterwards.
 */

import type { EntityTagger, TaggedEntity } from '../types';
import { EntityTaggerUnavailableError } from '../types';
import { logger } from '../../logger';

/**
 * One token as returned by the token-classification pipeline.
 */
export interface TokenPrediction {
  /** BIO label, e.g. "B-PER", "I-LOC" */
  entity: string;
  /** Token text; word pieces continuing a word start with "##" */
  word: string;
  /** Token position in the model input */
  index: number;
  score: number;
}

export type TokenClassifier = (text: string) => Promise<unknown>;

function isTokenPrediction(value: unknown): value is TokenPrediction {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'entity' in value &&
    typeof value.entity === 'string' &&
    'word' in value &&
    typeof value.word === 'string' &&
    'index' in value &&
    typeof value.index === 'number'
  );
}

/**
 * Narrow raw pipeline output to token predictions. Batched output (an array
 * of arrays) is flattened.
 */
export function toTokenPredictions(output: unknown): TokenPrediction[] {
  if (!Array.isArray(output)) return [];
  const flat: unknown[] = output.flatMap((entry: unknown) => (Array.isArray(entry) ? entry : [entry]));
  return flat.filter(isTokenPrediction);
}

function splitLabel(label: string): { prefix: string; type: string } {
  const dash = label.indexOf('-');
  if (dash === -1) return { prefix: '', type: label };
  return { prefix: label.slice(0, dash), type: label.slice(dash + 1) };
}

function joinPieces(words: string[]): string {
  return words.reduce((text, word) => {
    if (word.startsWith('##')) return text + word.slice(2);
    return text ? `${text} ${word}` : word;
  }, '');
}

/**
 * Merge token predictions into entity spans, in input order.
 *
 * A token continues the current span when it has the same entity type, is the
 * next token position, and is either an "I-" token or a "##" word piece.
 */
export function aggregateTokens(predictions: TokenPrediction[]): TaggedEntity[] {
  const entities: TaggedEntity[] = [];
  let current: { type: string; words: string[]; lastIndex: number } | null = null;

  const flush = () => {
    if (current) {
      entities.push({ text: joinPieces(current.words), type: current.type });
      current = null;
    }
  };

  for (const prediction of predictions) {
    const { prefix, type } = splitLabel(prediction.entity);
    if (type === 'O') {
      flush();
      continue;
    }

    const continues =
      current !== null &&
      current.type === type &&
      prediction.index === current.lastIndex + 1 &&
      (prefix === 'I' || prediction.word.startsWith('##'));

    if (continues && current) {
      current.words.push(prediction.word);
      current.lastIndex = prediction.index;
    } else {
      flush();
      current = { type, words: [prediction.word], lastIndex: prediction.index };
    }
  }

  flush();
  return entities;
}

/**
 * Split text at whitespace into chunks of at most maxChars (a single longer
 * word becomes its own chunk). Keeps inputs within the model's sequence length.
 */
export function splitIntoChunks(text: string, maxChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    if (current && current.length + 1 + word.length > maxChars) {
      chunks.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

export class TransformersEntityTagger implements EntityTagger {
  constructor(
    private readonly classify: TokenClassifier,
    private readonly chunkChars: number
  ) {}

  async tag(text: string): Promise<TaggedEntity[]> {
    const entities: TaggedEntity[] = [];

    for (const chunk of splitIntoChunks(text, this.chunkChars)) {
      const output = await this.classify(chunk);
      entities.push(...aggregateTokens(toTokenPredictions(output)));
    }

    return entities;
  }
}

/**
 * Load the token-classification model from modelPath and wrap it as an
 * EntityTagger. Remote model downloads are disabled. Call once at process startup.
 *
 * @throws EntityTaggerUnavailableError when the runtime or the model files cannot be loaded
 */
export async function loadEntityTagger(model: string, chunkChars: number, modelPath: string): Promise<EntityTagger> {
  const startTime = Date.now();
  logger.info('Loading entity tagging model', { model, model_path: modelPath });

  try {
    // Only statistical extraction needs the inference runtime
    const { env, pipeline } = await import('@huggingface/transformers');
    env.allowRemoteModels = false;
    env.localModelPath = modelPath;

    const classifier = await pipeline('token-classification', model);

    logger.info('Entity tagging model loaded', {
      model,
      duration_ms: Date.now() - startTime,
    });

    return new TransformersEntityTagger(async (text: string): Promise<unknown> => classifier(text), chunkChars);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EntityTaggerUnavailableError(`Entity tagging model "${model}" could not be loaded from ${modelPath}: ${reason}`);
  }
}
