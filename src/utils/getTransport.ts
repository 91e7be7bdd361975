import type pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';
const STDERR_DESTINATION = 2;

function isPinoPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  // Worker-thread transports would outlive a test run
  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  if (env.NODE_ENV === 'development' && !isRunningInDocker() && isPinoPrettyAvailable()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION, // stdout belongs to the MCP stdio transport
      },
    };
  }

  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
