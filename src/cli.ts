#!/usr/bin/env node

import { parseArgs } from 'util';
import { ScraperServer } from './server';
import { APP_NAME, APP_VERSION } from './config/constants';
import { getEnvironment } from './config/environment';
import { logger } from './utils/logger';
import { isHttpUrl } from './utils/urlValidator';
import { scrapeWebsite } from './core/content/scrapePipeline';
import { closeBrowserPool } from './core/render/browserPool';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Extracts section-labelled content from web pages, as an MCP server or from the command line.

Usage: section-scraper [command] [options]

Commands:
  server         Start the MCP server (default)
  scrape <url>   Scrape one page and print the result as JSON
  health         Print {"status":"ok"} after validating configuration
  version        Show version information
  help           Show this help message

Options:
  --compact      Print scrape results on a single line
  --help, -h     Show help
  --version      Show version

Examples:
  section-scraper server
  section-scraper scrape "https://example.com"
  MAX_PAGES=1 section-scraper scrape "https://example.com/blog" --compact
`;

const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean' },
  compact: { type: 'boolean' },
} as const;

/** Writes to stdout; stderr belongs to the logger. */
export type Output = (line: string) => void;

async function scrapeCommand(
  url: string | undefined,
  compact: boolean,
  out: Output
): Promise<number> {
  if (!url || !isHttpUrl(url)) {
    console.error('scrape requires an absolute http(s) URL. Use --help for usage information.');
    return 1;
  }

  try {
    const result = await scrapeWebsite(url);
    out(compact ? JSON.stringify(result) : JSON.stringify(result, null, 2));
    return result.sections.length === 0 && result.errors.length > 0 ? 2 : 0;
  } finally {
    await closeBrowserPool();
  }
}

function startServer(): Promise<void> {
  const server = new ScraperServer();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
    try {
      await server.shutdown();
      logger.info('Browser pool closed successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  return server.start();
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true });
  } catch (error) {
    logger.error({ error }, 'Invalid command line arguments');
    console.error('Error parsing arguments. Use --help for usage information.');
    return null;
  }
}

/** Runs one CLI invocation and resolves to its exit code. */
export async function runCli(
  argv: string[],
  out: Output = line => console.log(line)
): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed) return 1;
  const { values, positionals } = parsed;

  if (values.help) {
    out(HELP_TEXT);
    return 0;
  }

  if (values.version) {
    out(`${APP_NAME} v${APP_VERSION}`);
    return 0;
  }

  const command = positionals[0] || 'server';

  switch (command) {
    case 'server':
      await startServer();
      return 0;

    case 'scrape':
      return scrapeCommand(positionals[1], values.compact === true, out);

    case 'health':
      try {
        getEnvironment();
        out(JSON.stringify({ status: 'ok' }));
        return 0;
      } catch (error) {
        console.error(
          'Health check failed:',
          error instanceof Error ? error.message : 'Unknown error'
        );
        return 1;
      }

    case 'version':
      out(`${APP_NAME} v${APP_VERSION}`);
      return 0;

    case 'help':
      out(HELP_TEXT);
      return 0;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      // The server keeps the process alive on its own; other commands end here
      if (code !== 0) process.exit(code);
    })
    .catch(error => {
      logger.error({ error }, 'CLI execution failed');
      console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
      process.exit(1);
    });
}
