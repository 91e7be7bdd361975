#!/usr/bin/env node

import { ScraperServer } from './server';
import { logger } from './utils/logger';

export { scrapeWebsite, type ScrapeOptions } from './core/content/scrapePipeline';
export {
  createScrapeConfig,
  DEFAULT_SCRAPE_CONFIG,
  type ScrapeConfig,
} from './config/scrapeConfig';
export { closeBrowserPool } from './core/render/browserPool';
export type { ScrapeResult, Section, MetaInfo, ErrorRecord } from './core/content/types/scrape';
export { ScraperServer };

if (process.env.NODE_ENV !== 'test' && require.main === module) {
  const server = new ScraperServer();

  // Graceful shutdown handling
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
    try {
      await server.shutdown();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  server.start().catch(error => {
    logger.error({ error }, 'Fatal error during server startup');
    process.exit(1);
  });
}
