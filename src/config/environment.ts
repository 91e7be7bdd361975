import { z } from 'zod';
import fs from 'fs';

const EnvironmentSchema = z.object({
  // Static fetch
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Rendering and interaction bounds
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  INTERACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MAX_PAGES: z.coerce.number().int().min(1).max(10).default(3),
  MAX_SCROLLS: z.coerce.number().int().min(0).max(10).default(3),

  // Fallback heuristic
  MIN_STATIC_TEXT_LENGTH: z.coerce.number().int().min(0).default(500),

  // Browser pool
  BROWSER_POOL_SIZE: z.coerce.number().int().min(1).max(10).default(2),
  BROWSER_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BROWSER_HEADLESS: z.enum(['true', 'false']).default('true'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);
    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

// Check if running in Docker container
export function isRunningInDocker(): boolean {
  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    // Not a Docker-created container
  }

  if (process.env.DOCKER_CONTAINER) {
    return true;
  }

  try {
    const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf8');
    return cgroup.includes('docker') || cgroup.includes('containerd');
  } catch {
    return false;
  }
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
