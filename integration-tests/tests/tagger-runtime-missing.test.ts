/**
 * Extraction Without the Inference Runtime
 *
 * The transformers.js module fails to load; everything but the tagger must
 * keep working.
 */

import { ContractExtractor, EntityTaggerUnavailableError, loadEntityTagger } from '@contract-extraction/shared';
import { SAMPLE_CONTRACT, toBytes, utf8TextExtractor } from './helpers';

vi.mock('@huggingface/transformers', () => {
  throw new Error('inference runtime missing');
});

describe('without the inference runtime', () => {
  it('should still extract with the pattern strategy', async () => {
    const extractor = new ContractExtractor({ textExtractor: utf8TextExtractor });

    const record = await extractor.extract(toBytes(SAMPLE_CONTRACT), 'pattern');

    expect(record?.party.name).toBe('Maria Souza');
    expect(record?.order_total).toBe('R$ 500,00');
  });

  it('should report the tagger as unavailable', async () => {
    await expect(loadEntityTagger('test-ner-model', 1000, '/models-test/')).rejects.toBeInstanceOf(
      EntityTaggerUnavailableError
    );
  });
});
