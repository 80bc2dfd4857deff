import dotenv from 'dotenv';
import { DEFAULT_CHUNK_LIMIT } from './utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  chunkLimit: DEFAULT_CHUNK_LIMIT,
  outputDir: '.',
  inputDir: '.',
  compress: false,
  strict: false,
} as const;

/**
 * Get a string configuration value from environment variable or default
 */
export function getEnvString(
  envKey: string,
  defaultValue: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const envValue = env[envKey];
  return envValue === undefined || envValue === '' ? defaultValue : envValue;
}

/**
 * Get a numeric configuration value; unparseable values fall back to the default
 */
export function getEnvNumber(
  envKey: string,
  defaultValue: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const envValue = env[envKey];
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }
  const parsed = Number(envValue);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get a boolean configuration value; only "true" (any case) enables it
 */
export function getEnvBoolean(
  envKey: string,
  defaultValue: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const envValue = env[envKey];
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }
  return envValue.toLowerCase() === 'true';
}

export interface AppConfig {
  chunkLimit: number;
  outputDir: string;
  inputDir: string;
  compress: boolean;
  strict: boolean;
}

/**
 * Reads application configuration from the environment
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    chunkLimit: getEnvNumber('FILE_PARTS_CHUNK_LIMIT', DEFAULT_CONFIG.chunkLimit, env),
    outputDir: getEnvString('FILE_PARTS_OUTPUT_DIR', DEFAULT_CONFIG.outputDir, env),
    inputDir: getEnvString('FILE_PARTS_INPUT_DIR', DEFAULT_CONFIG.inputDir, env),
    compress: getEnvBoolean('FILE_PARTS_COMPRESS', DEFAULT_CONFIG.compress, env),
    strict: getEnvBoolean('FILE_PARTS_STRICT', DEFAULT_CONFIG.strict, env),
  };
}

/**
 * Application configuration loaded from environment variables
 */
export const config: AppConfig = readConfig();
