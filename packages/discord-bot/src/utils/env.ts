/**
 * @description: Loads and validates Discord bot environment configuration and defaults.
 * @scope: utility
 * @module: EnvConfig
 * @risk: high - Misconfiguration can break auth or change how text commands are recognized.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

// Get the current directory
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Calculate .env file path
const envPath = path.resolve(__dirname, '../../../../.env');
logger.debug(`Loading environment variables from: ${envPath}`);

// Load environment variables from .env file in the root directory (when present).
if (fs.existsSync(envPath)) {
  const { error, parsed } = dotenv.config({ path: envPath });

  if (error) {
    logger.warn(`Failed to load .env file: ${error.message}`);
  } else if (parsed) {
    logger.debug(`Loaded environment variables: ${Object.keys(parsed).join(', ')}`);
  }
} else {
  logger.debug('No .env file found; relying on injected environment variables.');
}

/**
 * List of required environment variables that must be set for the application to run.
 */
const REQUIRED_ENV_VARS = [
  'DISCORD_TOKEN', // Discord bot token for authentication
  'CLIENT_ID'      // Discord application client ID
] as const;

/**
 * Defaults for the text-command and dispatch settings
 */
const DEFAULT_COMMAND_SETTINGS = {
  DEFAULT_PREFIX: '$',
  CASE_INSENSITIVE: true,
  IGNORE_BOTS: true,
  DM_ENABLED: true,
  ADMISSION_DEBOUNCE_MS: 4000
} as const;

/**
 * Reads a required variable.
 * @throws {Error} If the variable is missing or empty
 */
function requireEnv(key: (typeof REQUIRED_ENV_VARS)[number]): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Reads a numeric configuration value while gracefully handling invalid input
 */
export function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    logger.warn(
      `Ignoring invalid numeric value for ${key}: "${value}". Expected a non-negative number; using default (${defaultValue}).`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Gets a boolean from environment variables with a default value
 */
export function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Reads an optional string, treating blank values as unset.
 */
function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Reads the default prefix. Whitespace would make it unmatchable, so it is rejected.
 */
function getPrefixEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value.length === 0) {
    return defaultValue;
  }
  if (/\s/.test(value)) {
    logger.warn(`Ignoring ${key} because it contains whitespace; using default (${defaultValue}).`);
    return defaultValue;
  }
  return value;
}

/**
 * Application configuration object containing all environment-based settings.
 */
export const config = {
  // Bot configuration
  token: requireEnv('DISCORD_TOKEN'),
  clientId: requireEnv('CLIENT_ID'),
  /** Publish the command catalog to this guild only */
  debugGuildId: getOptionalEnv('DEBUG_GUILD'),

  // Environment
  env: process.env.NODE_ENV || 'development',
  isProduction: (process.env.NODE_ENV || 'development') === 'production',

  // Text commands and dispatch
  commands: {
    defaultPrefix: getPrefixEnv('DEFAULT_PREFIX', DEFAULT_COMMAND_SETTINGS.DEFAULT_PREFIX),
    caseInsensitive: getBooleanEnv('CASE_INSENSITIVE', DEFAULT_COMMAND_SETTINGS.CASE_INSENSITIVE),
    ignoreBots: getBooleanEnv('IGNORE_BOTS', DEFAULT_COMMAND_SETTINGS.IGNORE_BOTS),
    dmEnabled: getBooleanEnv('DM_ENABLED', DEFAULT_COMMAND_SETTINGS.DM_ENABLED),
    admissionDebounceMs: getNumberEnv('ADMISSION_DEBOUNCE_MS', DEFAULT_COMMAND_SETTINGS.ADMISSION_DEBOUNCE_MS)
  }
};

logger.debug(`Command settings: ${JSON.stringify(config.commands)}`);
