/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the engine reads.
 * Parsing is side-effect free; `./index.ts` assembles the typed config from
 * the parsed result.
 */

import { z } from 'zod';
import { isJestRuntime, isTruthyFlag } from '../utils/envFlags';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from '../engine/boardUtil';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const BooleanFlagSchema = z
  .string()
  .optional()
  .transform((raw) => isTruthyFlag(raw));

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of an additional JSON file transport */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // BOARD
  // ===================================================================

  /** Board size used when a GameBoard is created without an explicit size */
  GOMOKU_DEFAULT_BOARD_SIZE: z.coerce
    .number()
    .int()
    .min(MIN_BOARD_SIZE)
    .max(MAX_BOARD_SIZE)
    .default(7),

  /** Recompute the per-color stone index after every mutation and fail on drift */
  GOMOKU_AUDIT_INDEX: BooleanFlagSchema,
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationError {
  path: string;
  message: string;
}

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: EnvValidationError[];
}

export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Determine the effective node environment. Inside a Jest worker this is
 * always 'test', whatever NODE_ENV says.
 */
export function getEffectiveNodeEnv(env: Pick<RawEnv, 'NODE_ENV'>): NodeEnv {
  if (isJestRuntime()) {
    return 'test';
  }
  return env.NODE_ENV;
}
