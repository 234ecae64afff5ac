import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface StabilityConfig {
  enabled: boolean;
  strongSkipping: boolean;
  ignoredTypePatterns: string[];
  configurationFile?: string;
  maxRecursionDepth: number;
}

export interface CascadeConfig {
  maxDepth: number;
}

export interface Config {
  logging: LoggingConfig;
  stability: StabilityConfig;
  cascade: CascadeConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getEnvVarAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new Error(`Environment variable ${key} must be a boolean (true/false)`);
}

function getEnvVarAsList(key: string): string[] {
  const value = process.env[key];
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE,
  },
  stability: {
    enabled: getEnvVarAsBoolean('STABILITY_CHECK_ENABLED', true),
    strongSkipping: getEnvVarAsBoolean('STABILITY_STRONG_SKIPPING', false),
    ignoredTypePatterns: getEnvVarAsList('STABILITY_IGNORED_TYPES'),
    configurationFile: process.env.STABILITY_CONFIG_FILE,
    maxRecursionDepth: getEnvVarAsNumber('STABILITY_MAX_RECURSION_DEPTH', 64),
  },
  cascade: {
    maxDepth: getEnvVarAsNumber('CASCADE_MAX_DEPTH', 10),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
