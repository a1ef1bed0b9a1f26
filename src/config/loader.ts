/**
 * Configuration Loader
 *
 * Loads and validates configuration from files and environment variables.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { PckConfig, PckConfigInput } from './schema.js';
import { CONFIG_SECTIONS, PckConfigSchema } from './schema.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Path to config file */
  configPath?: string;
  /** Override values (highest priority) */
  overrides?: PckConfigInput;
  /** Whether to apply environment variable overrides */
  applyEnv?: boolean;
  /** Environment to read, defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: PckConfig;
  errors?: string[];
}

type ConfigRecord = Record<string, unknown>;

// -----------------------------------------------------------------------------
// Default Paths
// -----------------------------------------------------------------------------

const DEFAULT_CONFIG_PATHS = ['pck.config.json', 'config/pck.json'];

export const CONFIG_ENV_PREFIX = 'PCK_';
export const CONFIG_PATH_ENV_VAR = 'PCK_CONFIG_PATH';

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Load configuration from file and/or environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): PckConfig {
  const { configPath, overrides = {}, applyEnv = true, env = process.env } = options;

  let fileConfig: ConfigRecord = {};
  const resolvedPath = findConfigFile(configPath, env);
  if (resolvedPath) {
    fileConfig = loadConfigFile(resolvedPath);
  } else if (configPath) {
    throw new ConfigParseError(configPath, 'file not found');
  }

  const envConfig = applyEnv ? loadEnvConfig(env) : {};

  // Merge configs: defaults < file < env < overrides
  const merged = deepMerge({}, fileConfig, envConfig, overrides);

  const result = PckConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  return result.data;
}

/**
 * Validate a configuration object.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const result = PckConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return {
    valid: false,
    errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

// -----------------------------------------------------------------------------
// File Loading
// -----------------------------------------------------------------------------

function findConfigFile(explicitPath: string | undefined, env: NodeJS.ProcessEnv): string | null {
  if (explicitPath) {
    const resolved = resolve(explicitPath);
    return existsSync(resolved) ? resolved : null;
  }

  const envPath = env[CONFIG_PATH_ENV_VAR];
  if (envPath) {
    const resolved = resolve(envPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  for (const defaultPath of DEFAULT_CONFIG_PATHS) {
    const resolved = resolve(defaultPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  return null;
}

function loadConfigFile(path: string): ConfigRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigParseError(path, error.message);
    }
    throw error;
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError(path, 'top level must be an object');
  }
  return parsed;
}

// -----------------------------------------------------------------------------
// Environment Loading
// -----------------------------------------------------------------------------

/** camelCase to SCREAMING_SNAKE_CASE */
function toEnvName(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

interface EnvKey {
  path: [string] | [string, string];
  /** Keep the raw string instead of coercing numbers and booleans */
  isString: boolean;
}

function isStringField(field: z.ZodTypeAny): boolean {
  const inner = field instanceof z.ZodDefault ? field._def.innerType : field;
  return inner instanceof z.ZodString;
}

/**
 * Environment variable name to config path, built from the schema.
 */
function buildEnvKeyMap(): Map<string, EnvKey> {
  const map = new Map<string, EnvKey>();
  map.set(`${CONFIG_ENV_PREFIX}NAME`, { path: ['name'], isString: true });
  map.set(`${CONFIG_ENV_PREFIX}ENVIRONMENT`, { path: ['environment'], isString: true });

  for (const [section, schema] of Object.entries(CONFIG_SECTIONS)) {
    for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      map.set(`${CONFIG_ENV_PREFIX}${toEnvName(section)}_${toEnvName(key)}`, {
        path: [section, key],
        isString: isStringField(field),
      });
    }
  }
  return map;
}

const ENV_KEY_MAP = buildEnvKeyMap();

/**
 * Load configuration from environment variables.
 *
 * Format: PCK_<SECTION>_<KEY>=value
 * Examples:
 *   PCK_CONNECTION_HOST=192.168.1.100
 *   PCK_SETTINGS_DEFAULT_TIMEOUT_MS=5000
 *   PCK_LOGGING_LEVEL=debug
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const config: ConfigRecord = {};

  for (const [name, value] of Object.entries(env)) {
    if (!value) continue;
    const envKey = ENV_KEY_MAP.get(name);
    if (!envKey) continue;

    const parsed = envKey.isString ? value : parseEnvValue(value);
    const [first, second] = envKey.path;
    if (second === undefined) {
      config[first] = parsed;
      continue;
    }
    const section = config[first];
    const target: ConfigRecord = isRecord(section) ? section : {};
    target[second] = parsed;
    config[first] = target;
  }

  return config;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

// -----------------------------------------------------------------------------
// Deep Merge
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge objects (later objects override earlier).
 */
function deepMerge(...objects: ConfigRecord[]): ConfigRecord {
  const result: ConfigRecord = {};

  for (const obj of objects) {
    for (const key of Object.keys(obj)) {
      const value = obj[key];
      const existing = result[key];

      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Configuration validation failed:\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigParseError extends Error {
  constructor(
    public readonly path: string,
    public readonly parseError: string
  ) {
    super(`Failed to parse config file '${path}': ${parseError}`);
    this.name = 'ConfigParseError';
  }
}
