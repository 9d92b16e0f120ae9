/**
 * Contract API - service entry point
 *
 * Loads the entity tagging model once, then serves the HTTP API.
 */

import {
  logger,
  config,
  ContractExtractor,
  loadEntityTagger,
  type EntityTagger,
} from '@contract-extraction/shared';
import { createApp } from './app';

/**
 * Load the tagger for statistical extraction. A failure keeps the service up
 * in pattern-only mode; statistical requests then fail with a configuration error.
 */
async function loadTagger(): Promise<EntityTagger | null> {
  if (!config.enableNer) {
    logger.warn('Entity tagging disabled by configuration, statistical extraction unavailable');
    return null;
  }

  try {
    return await loadEntityTagger(config.nerModel, config.nerChunkChars, config.nerModelPath);
  } catch (error) {
    logger.warn('Entity tagging model could not be loaded, statistical extraction unavailable', {
      model: config.nerModel,
      model_path: config.nerModelPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

async function main(): Promise<void> {
  const tagger = await loadTagger();
  const extractor = new ContractExtractor({ tagger });
  const app = createApp({ extractor });

  const server = app.listen(config.port, () => {
    logger.info('Contract API started', {
      port: config.port,
      extraction_modes: extractor.availableModes(),
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Contract API failed to start', error);
  process.exit(1);
});
