import type pino from 'pino';
import { ScrapeInput } from '../mcp/schemas';
import { ValidationError } from '../mcp/errors';
import { scrapeWebsite } from '../core/content/scrapePipeline';
import { isHttpUrl } from '../utils/urlValidator';
import type { HandlerContext } from '../mcp/mcpServer';

export async function handleScrapePage(
  args: unknown,
  logger: pino.Logger,
  context?: HandlerContext
): Promise<{ content: { type: 'text'; text: string }[] }> {
  const parsed = ScrapeInput.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(issues.join('; '));
  }

  const { url } = parsed.data;
  if (!isHttpUrl(url)) {
    throw new ValidationError('url: Only absolute http(s) URLs are supported');
  }

  logger.debug({ url }, 'Processing scrape request');
  await context?.sendProgress(0, 100, 'Scraping page...');

  const correlationId = logger.bindings().correlationId;
  const result = await scrapeWebsite(url, {
    correlationId: typeof correlationId === 'string' ? correlationId : undefined,
  });

  await context?.sendProgress(100, 100, 'Scrape complete');
  logger.info(
    {
      url,
      strategy: result.strategy,
      sectionCount: result.sections.length,
      errorCount: result.errors.length,
    },
    'Scrape completed'
  );

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}
