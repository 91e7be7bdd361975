import pino from 'pino';
import { getEnvironment } from '../config/environment';
import { APP_NAME } from '../config/constants';
import { getTransport } from './getTransport';

// Sensitive keys to redact from logs
const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
];

function createRedactor(): (obj: Record<string, unknown>) => Record<string, unknown> {
  return (obj: Record<string, unknown>) => {
    const redacted = { ...obj };

    Object.keys(redacted).forEach(key => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
        redacted[key] = '[REDACTED]';
      }
    });

    return redacted;
  };
}

function resolveLevel(): pino.LevelWithSilent {
  const env = getEnvironment();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function createLogger(): pino.Logger {
  return pino({
    name: APP_NAME,
    level: resolveLevel(),
    transport: getTransport(),
    redact: {
      paths: SENSITIVE_KEYS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: createRedactor(),
    },
  });
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

export const logger: pino.Logger = new Proxy({} as pino.Logger, {
  get: (_target, prop: string | symbol) => {
    const real = getLogger();

    const value: unknown = Reflect.get(real, prop);
    if (typeof value === 'function') {
      return value.bind(real);
    }
    return value;
  },
});

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

export function generateCorrelationId(): string {
  return `scrape-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
