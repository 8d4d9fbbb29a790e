/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables the
 * client reads, validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { GAME_TYPE } from '../../shared/engine/rulesConfig';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston's npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const PortSchema = z.coerce.number().int().min(1).max(65535);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // GAME SERVER
  // ===================================================================

  /** Game server host */
  SC_HOST: z.string().min(1).default('localhost'),

  /** Game server port */
  SC_PORT: PortSchema.default(13050),

  /** Reservation code for a prepared game; joins by game type when absent */
  SC_RESERVATION: z.string().optional(),

  /** Game type sent when joining without a reservation */
  SC_GAME_TYPE: z.string().min(1).default(GAME_TYPE),

  // ===================================================================
  // PLAYER
  // ===================================================================

  /** Time budget for the player's move computation */
  MOVE_TIMEOUT_MS: z.coerce.number().int().positive().default(1800),

  /** Seed for reproducible move selection */
  AI_SEED: z.coerce.number().int().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written; defaults to 'error' under test */
  LOG_LEVEL: LogLevelSchema.optional(),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Additional JSON log file */
  LOG_FILE: z.string().optional(),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables. Empty strings count as unset.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((e) => ({ path: e.path.join('.'), message: e.message }))
        : [{ path: '', message: result.error.message }];
    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints one line per problem and exits the process.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
