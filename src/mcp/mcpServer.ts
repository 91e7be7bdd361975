import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { APP_NAME, APP_VERSION, MCP_TOOL_DESCRIPTIONS } from '../config/constants';
import { generateCorrelationId, createChildLogger, withTiming } from '../utils/logger';
import { handleMcpError, ValidationError } from './errors';
import { ScrapeInput, HealthInput } from './schemas';
import { handleScrapePage, handleHealth } from '../handlers/index';

/**
 * Context passed to handlers for progress notifications
 */
export interface HandlerContext {
  progressToken?: string | number;
  sendProgress: (progress: number, total?: number, message?: string) => Promise<void>;
}

// Create the MCP server instance
export const mcpServer = new Server(
  {
    name: APP_NAME,
    version: APP_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// Set up request handlers
mcpServer.setRequestHandler(ListToolsRequestSchema, async () => {
  const correlationId = generateCorrelationId();
  const childLogger = createChildLogger(correlationId);

  childLogger.debug('Listing available tools');

  return {
    tools: [
      {
        name: 'web.scrape',
        description: MCP_TOOL_DESCRIPTIONS.SCRAPE,
        inputSchema: zodToJsonSchema(ScrapeInput),
      },
      {
        name: 'system.health',
        description: MCP_TOOL_DESCRIPTIONS.HEALTH,
        inputSchema: zodToJsonSchema(HealthInput),
      },
    ],
  };
});

// Handle tool calls
mcpServer.setRequestHandler(CallToolRequestSchema, async request => {
  const correlationId = generateCorrelationId();
  const childLogger = createChildLogger(correlationId);

  try {
    childLogger.info({ tool: request.params.name }, 'Tool call received');

    // Extract progress token from request metadata
    const progressToken = request.params._meta?.progressToken;

    // Create progress notification sender
    const context: HandlerContext = {
      progressToken,
      sendProgress: async (progress: number, total?: number, message?: string) => {
        if (progressToken) {
          await mcpServer.notification({
            method: 'notifications/progress',
            params: {
              progressToken,
              progress,
              ...(total !== undefined && { total }),
              ...(message && { message }),
            },
          });
          childLogger.debug({ progress, total, message }, 'Progress notification sent');
        }
      },
    };

    switch (request.params.name) {
      case 'web.scrape':
        return await withTiming(childLogger, 'tool:web.scrape', async () =>
          handleScrapePage(request.params.arguments, childLogger, context)
        );

      case 'system.health':
        return await handleHealth(childLogger);

      default:
        throw new ValidationError(`Unknown tool: ${request.params.name}`);
    }
  } catch (error) {
    childLogger.error({ error, tool: request.params.name }, 'Tool call failed');
    throw handleMcpError(error, `Tool call: ${request.params.name}`);
  }
});
