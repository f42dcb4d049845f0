/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from '../config';
 *
 * - `env.ts` - raw environment variable schema
 * - `index.ts` (this file) - typed, frozen application config
 */

import dotenv from 'dotenv';
import { getEffectiveNodeEnv, parseEnv } from './env';
import type { LogFormat, LogLevel, NodeEnv } from './env';
import { isTestEnvironment } from '../utils/envFlags';

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file?: string | undefined;
  };
  board: {
    defaultSize: number;
    auditIndex: boolean;
  };
}

export class ConfigValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid environment configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.problems = problems;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * Build the application config from a raw environment map.
 *
 * Throws {@link ConfigValidationError} listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    const problems = (result.errors ?? []).map(
      (error) => `${error.path || 'root'}: ${error.message}`
    );
    throw new ConfigValidationError(problems);
  }

  const data = result.data;
  const nodeEnv = getEffectiveNodeEnv(data);
  const logFile = data.LOG_FILE?.trim() || undefined;

  return Object.freeze({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logging: Object.freeze({
      level: data.LOG_LEVEL,
      format: data.LOG_FORMAT,
      file: logFile,
    }),
    board: Object.freeze({
      defaultSize: data.GOMOKU_DEFAULT_BOARD_SIZE,
      auditIndex: data.GOMOKU_AUDIT_INDEX,
    }),
  });
}

// Skip .env in tests so it cannot override test-specific variables.
if (!isTestEnvironment()) {
  dotenv.config();
}

export const config = loadConfig();

export { EnvSchema, LogFormatSchema, LogLevelSchema, NodeEnvSchema, parseEnv } from './env';
export type { EnvValidationResult, LogFormat, LogLevel, NodeEnv, RawEnv } from './env';
