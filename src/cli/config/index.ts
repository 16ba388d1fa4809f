/**
 * Application configuration.
 *
 * Loads `.env`, validates the environment with Zod, and exports a frozen
 * config object that the rest of the CLI reads.
 *
 * Usage:
 *   import { config } from './config';
 */

import dotenv from 'dotenv';
import { getEffectiveNodeEnv, parseEnv, type LogFormat, type LogLevel, type NodeEnv } from './env';

// Skip in test mode so a local .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

export interface AppConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
}

const nodeEnv = getEffectiveNodeEnv(env);

export const config: Readonly<AppConfig> = Object.freeze({
  nodeEnv,
  isTest: nodeEnv === 'test',
  logging: Object.freeze({
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  }),
});

export type { LogFormat, LogLevel, NodeEnv } from './env';
