import { getEnvironment, validateEnvironment } from '../config/environment';
import { logger } from '../utils/logger';

export class InitializationService {
  async initialize(): Promise<void> {
    try {
      // Validate environment variables
      logger.info('Validating environment configuration');
      validateEnvironment();

      const env = getEnvironment();
      logger.info(
        {
          maxPages: env.MAX_PAGES,
          maxScrolls: env.MAX_SCROLLS,
          browserPoolSize: env.BROWSER_POOL_SIZE,
          headless: env.BROWSER_HEADLESS === 'true',
        },
        'Application initialized successfully'
      );
    } catch (error) {
      logger.error({ error }, 'Failed to initialize application');
      throw error;
    }
  }
}
