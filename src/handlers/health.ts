import type pino from 'pino';
import type { HealthOutputType } from '../mcp/schemas';

export async function handleHealth(
  logger: pino.Logger
): Promise<{ content: { type: 'text'; text: string }[] }> {
  const output: HealthOutputType = { status: 'ok' };
  logger.debug('Health check');
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(output),
      },
    ],
  };
}
