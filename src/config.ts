import * as dotenv from 'dotenv';
import { LogLevel, parseLogLevel } from './logging/structured-logger';

export interface RegistryConfig {
  adminId: string;
  port: number;
  /** Undefined when persistence is disabled */
  dataDir?: string;
  logLevel: LogLevel;
  jsonLogs: boolean;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the node configuration from environment variables.
 * All problems are collected and reported together.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const problems: string[] = [];

  const adminId = (env.ADMIN_ID || '').trim();
  if (!adminId) {
    problems.push('ADMIN_ID is required (identity allowed to mint artworks)');
  }

  const port = Number(env.PORT || '3000');
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const logLevel = env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : LogLevel.INFO;
  if (logLevel === undefined) {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`);
  }

  if (problems.length > 0 || logLevel === undefined) {
    throw new ConfigError(problems);
  }

  const persist = (env.PERSIST || 'true').toLowerCase() !== 'false';
  const dataDir = env.DATA_DIR ?? './registry-data';

  return {
    adminId,
    port,
    dataDir: persist && dataDir !== '' ? dataDir : undefined,
    logLevel,
    jsonLogs: env.NODE_ENV === 'production',
  };
}

/**
 * Load .env into process.env, then read the configuration.
 */
export function loadConfigFromEnvironment(): RegistryConfig {
  dotenv.config();
  return loadConfig(process.env);
}
