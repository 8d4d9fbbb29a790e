/**
 * Unified Client Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all client code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed client config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Command-line flags are applied on top of this object by the CLI entry
 * point (see `cli.ts`); nothing here reads argv.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  PortSchema,
  getEffectiveNodeEnv,
  loadEnvOrExit,
} from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer .env cannot leak into tests.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);

const nodeEnv = getEffectiveNodeEnv(env);
const isTest = nodeEnv === 'test';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  server: z.object({
    host: z.string().min(1),
    port: PortSchema,
  }),
  game: z.object({
    /** Reservation code; joins by game type when undefined */
    reservation: z.string().optional(),
    gameType: z.string().min(1),
  }),
  player: z.object({
    moveTimeoutMs: z.number().int().positive(),
    seed: z.number().int().optional(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
});

/**
 * Client configuration type inferred from the schema.
 */
export type ClientConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isTest,
  server: {
    host: env.SC_HOST,
    port: env.SC_PORT,
  },
  game: {
    reservation: env.SC_RESERVATION?.trim() || undefined,
    gameType: env.SC_GAME_TYPE,
  },
  player: {
    moveTimeoutMs: env.MOVE_TIMEOUT_MS,
    seed: env.AI_SEED,
  },
  logging: {
    level: env.LOG_LEVEL ?? (isTest ? 'error' : 'info'),
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: ClientConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
