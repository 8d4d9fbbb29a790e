/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation: defaults,
 * coercion of numeric values, and rejection of invalid values.
 */

import {
  EnvSchema,
  parseEnv,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  type RawEnv,
} from '../../src/client/config/env';

function expectValid(env: Record<string, string | undefined>): RawEnv {
  const result = parseEnv(env);
  if (!result.success) {
    throw new Error(`Expected valid env, got ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

function errorPaths(env: Record<string, string | undefined>): string[] {
  const result = parseEnv(env);
  return result.success ? [] : result.errors.map((e) => e.path);
}

describe('EnvSchema', () => {
  it('should apply defaults to an empty environment', () => {
    const data = expectValid({});

    expect(data).toEqual({
      NODE_ENV: 'development',
      SC_HOST: 'localhost',
      SC_PORT: 13050,
      SC_GAME_TYPE: 'swc_2020_hive',
      MOVE_TIMEOUT_MS: 1800,
      LOG_FORMAT: 'pretty',
    });
  });

  it('should be exported for direct use', () => {
    expect(EnvSchema.safeParse({ SC_PORT: '1' }).success).toBe(true);
  });

  describe('NODE_ENV validation', () => {
    it('should accept valid NODE_ENV values', () => {
      for (const nodeEnv of ['development', 'production', 'test']) {
        expect(expectValid({ NODE_ENV: nodeEnv }).NODE_ENV).toBe(nodeEnv);
      }
    });

    it('should reject invalid NODE_ENV values', () => {
      expect(errorPaths({ NODE_ENV: 'staging' })).toEqual(['NODE_ENV']);
    });
  });

  describe('SC_PORT validation', () => {
    it('should coerce a string port to a number', () => {
      expect(expectValid({ SC_PORT: '13051' }).SC_PORT).toBe(13051);
    });

    it.each(['0', '65536', 'abc', '1.5'])('should reject %s', (port) => {
      expect(errorPaths({ SC_PORT: port })).toEqual(['SC_PORT']);
    });
  });

  describe('player settings', () => {
    it('should coerce timeout and seed', () => {
      const data = expectValid({ MOVE_TIMEOUT_MS: '500', AI_SEED: '42' });
      expect(data.MOVE_TIMEOUT_MS).toBe(500);
      expect(data.AI_SEED).toBe(42);
    });

    it('should reject a non-positive timeout', () => {
      expect(errorPaths({ MOVE_TIMEOUT_MS: '0' })).toEqual(['MOVE_TIMEOUT_MS']);
    });
  });

  describe('logging', () => {
    it('should accept winston levels', () => {
      expect(expectValid({ LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug');
    });

    it('should reject unknown levels and formats', () => {
      expect(errorPaths({ LOG_LEVEL: 'trace', LOG_FORMAT: 'xml' })).toEqual(['LOG_LEVEL', 'LOG_FORMAT']);
    });
  });

  it('should treat empty strings as unset', () => {
    const data = expectValid({ SC_HOST: '', SC_PORT: '  ', SC_RESERVATION: '' });
    expect(data.SC_HOST).toBe('localhost');
    expect(data.SC_PORT).toBe(13050);
    expect(data.SC_RESERVATION).toBeUndefined();
  });

  it('should ignore unrelated variables', () => {
    expect(expectValid({ PATH: '/usr/bin', SC_RESERVATION: 'test-reservation' }).SC_RESERVATION).toBe(
      'test-reservation'
    );
  });
});

describe('environment helpers', () => {
  it('should report test under Jest regardless of NODE_ENV', () => {
    expect(getEffectiveNodeEnv(expectValid({ NODE_ENV: 'production' }))).toBe('test');
  });

  it('should classify environments', () => {
    expect(isProduction('production')).toBe(true);
    expect(isProduction('development')).toBe(false);
    expect(isTest('test')).toBe(true);
    expect(isTest('production')).toBe(false);
  });
});
