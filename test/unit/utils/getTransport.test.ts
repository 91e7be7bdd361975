import { describe, test, expect, afterEach } from '@jest/globals';
import { getTransport } from '../../../src/utils/getTransport';
import { clearEnvironmentCache } from '../../../src/config/environment';

describe('getTransport', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
  });

  test('should use no transport under test', () => {
    expect(getTransport()).toBeUndefined();
  });

  test('should write to stderr in production', () => {
    process.env = { ...originalEnv, NODE_ENV: 'production' };
    clearEnvironmentCache();

    expect(getTransport()).toEqual({ target: 'pino/file', options: { destination: 2 } });
  });
});
