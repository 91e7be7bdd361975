import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from './utils/logger';
import { InitializationService } from './services/initialization';
import { TransportManager } from './transport/manager';
import { closeBrowserPool } from './core/render/browserPool';

/**
 * Section scraper MCP server: validates configuration, then serves tools over a transport.
 */
export class ScraperServer {
  private initService: InitializationService;
  private transportManager: TransportManager;

  constructor() {
    this.initService = new InitializationService();
    this.transportManager = new TransportManager();
  }

  async initialize(): Promise<void> {
    await this.initService.initialize();
  }

  /**
   * Connect to a transport (default: STDIO)
   */
  async connect(transport?: StdioServerTransport): Promise<void> {
    await this.transportManager.connect(transport);
  }

  async start(): Promise<void> {
    try {
      await this.initialize();
      await this.connect();
    } catch (error) {
      logger.error({ error }, 'Failed to start MCP server');
      process.exit(1);
    }
  }

  /** Releases pooled browsers; safe to call more than once. */
  async shutdown(): Promise<void> {
    logger.info('Shutting down: closing browser pool');
    await closeBrowserPool();
  }
}

export { mcpServer } from './mcp/mcpServer';
