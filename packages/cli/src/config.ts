/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@mustard/logger';

export const DEFAULT_PARTIAL_EXTENSION = '.mustache';

export interface MustardConfig {
  environment: Environment;
  logLevel?: LogLevel;
  partialsDir?: string;
  partialExtension: string;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load mustard configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Relative MUSTARD_PARTIALS_DIR values resolve against `cwd`.
 *
 * @throws {Error} When MUSTARD_ENV or MUSTARD_LOG_LEVEL names an unknown value
 */
export function loadConfig(cwd: string = process.cwd(), env: EnvSource = process.env): MustardConfig {
  const merged: EnvSource = { ...findEnvFile(cwd) };

  // Override with process environment (higher priority)
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('MUSTARD_') && value) {
      merged[key] = value;
    }
  }

  const config: MustardConfig = {
    environment: 'production',
    partialExtension: DEFAULT_PARTIAL_EXTENSION,
  };

  const environment = merged.MUSTARD_ENV;
  if (environment) {
    if (!isEnvironment(environment)) {
      throw new Error(`Invalid MUSTARD_ENV '${environment}': expected test, development or production`);
    }
    config.environment = environment;
  }

  const logLevel = merged.MUSTARD_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid MUSTARD_LOG_LEVEL '${logLevel}'`);
    }
    config.logLevel = logLevel;
  }

  if (merged.MUSTARD_PARTIALS_DIR) {
    config.partialsDir = path.resolve(cwd, merged.MUSTARD_PARTIALS_DIR);
  }

  const extension = merged.MUSTARD_PARTIAL_EXT;
  if (extension) {
    config.partialExtension = extension.startsWith('.') ? extension : `.${extension}`;
  }

  return config;
}
