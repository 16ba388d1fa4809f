/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the replay tool
 * reads, validates them at startup, and exports the parsed result.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum level written by the diagnostic logger */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** Console log format: human-readable or one JSON object per line */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** When set, diagnostic logs are also appended to this file as JSON */
  LOG_FILE: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationError {
  path: string;
  message: string;
}

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: EnvValidationError[] };

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

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the effective environment is always "test", even if NODE_ENV
 * was set to something else by a .env file.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
