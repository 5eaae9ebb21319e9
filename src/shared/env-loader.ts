/**
 * Environment loading utilities
 * Resolves the project's .env file by walking up from the working directory
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { ConfigurationError } from './errors.js';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Directory to start the upward search from (default: process.cwd()) */
  startDir?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
  /** Additional environment variables to set (useful for testing) */
  overrides?: Record<string, string>;
}

/**
 * Find the project root by looking for a .env file or package.json
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = path.resolve(startDir);

  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return path.resolve(startDir);
}

/**
 * Load environment variables from the project's .env file
 *
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from './shared/index.js';
 *
 * loadEnv();
 * ```
 */
export function loadEnv(options: EnvLoaderOptions = {}): string | null {
  const envPath = options.envPath
    ?? path.resolve(findProjectRoot(options.startDir ?? process.cwd()), '.env');

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new ConfigurationError(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  // Values already present in the process environment win over the file
  dotenv.config({ path: envPath });

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      process.env[key] = value;
    }
  }

  return envPath;
}

/**
 * Get required environment variable or throw
 *
 * @throws ConfigurationError if variable is not set and no default provided
 */
export function getEnvOrThrow(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = ''): string {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get a numeric environment variable, rejecting values that do not parse
 */
export function getEnvNumber(name: string, defaultValue: number): number {
  const raw = getEnv(name);
  if (raw === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Get a boolean environment variable ("true"/"1"/"yes" are truthy)
 */
export function getEnvBoolean(name: string, defaultValue: boolean = false): boolean {
  const raw = getEnv(name).toLowerCase();
  if (raw === '') {
    return defaultValue;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}
