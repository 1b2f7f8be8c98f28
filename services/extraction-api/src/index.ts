/**
 * Extraction API entry point
 */

import { config, logger, ParseCache } from '@risklens/shared';
import { createApp } from './app';
import { createPipelineFromConfig } from './lib/pipeline';

async function main(): Promise<void> {
  const cache = config.parseCacheEnabled ? new ParseCache(config.parseCacheDir) : null;
  const pipeline = await createPipelineFromConfig(cache);
  const app = createApp({ pipeline, cache });

  const server = app.listen(config.port, () => {
    logger.info('Extraction API started', {
      port: config.port,
      parse_cache_dir: cache?.cacheDir ?? null,
      rag_enabled: config.enableRag,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Extraction API failed to start', error);
  process.exit(1);
});
