/**
 * Configuration Loader
 *
 * Loads and validates configuration from files and environment variables.
 * Accepts both the native camelCase layout and the snake_case add-on
 * `options.json` layout.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import type { BridgeConfig } from './schema.js';
import { BridgeConfigSchema } from './schema.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

type ConfigRecord = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Path to config file */
  configPath?: string;
  /** Override values (highest priority) */
  overrides?: ConfigRecord;
  /** Whether to apply environment variable overrides */
  applyEnv?: boolean;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: BridgeConfig;
  errors?: string[];
}

// -----------------------------------------------------------------------------
// Default Paths
// -----------------------------------------------------------------------------

export const DEFAULT_CONFIG_PATHS = [
  'bridge.config.json',
  'config/bridge.json',
  '/data/options.json',
];

const DEFAULT_CONFIG_ENV_VAR = 'BRIDGE_CONFIG_PATH';

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Load configuration from file and/or environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const { configPath, overrides = {}, applyEnv = true, env = process.env } = options;

  let fileConfig: ConfigRecord = {};

  const resolvedPath = findConfigFile(configPath, env);

  if (configPath && !resolvedPath) {
    throw new ConfigParseError(resolve(configPath), 'file not found');
  }

  if (resolvedPath) {
    fileConfig = normaliseAddonOptions(loadConfigFile(resolvedPath));
  }

  let envConfig: ConfigRecord = {};
  if (applyEnv) {
    envConfig = loadEnvConfig(env);
  }

  // Merge configs: defaults < file < env < overrides
  const merged = deepMerge({}, fileConfig, envConfig, overrides);

  return parseConfig(merged);
}

/**
 * Validate a configuration object, throwing ConfigValidationError on failure.
 */
export function parseConfig(config: unknown): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(errors);
  }

  return result.data;
}

/**
 * Validate a configuration object.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const result = BridgeConfigSchema.safeParse(config);

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

/**
 * Find the configuration file.
 */
function findConfigFile(explicitPath: string | undefined, env: NodeJS.ProcessEnv): string | null {
  if (explicitPath) {
    const resolved = resolve(explicitPath);
    return existsSync(resolved) ? resolved : null;
  }

  const envPath = env[DEFAULT_CONFIG_ENV_VAR];
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

/**
 * Load configuration from a JSON file.
 */
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
    throw new ConfigParseError(path, 'top-level value must be an object');
  }

  return parsed;
}

// -----------------------------------------------------------------------------
// Add-on Options
// -----------------------------------------------------------------------------

/**
 * Convert the snake_case add-on layout to the native layout. Objects without
 * a `ws_url` key are returned untouched.
 */
export function normaliseAddonOptions(options: ConfigRecord): ConfigRecord {
  if (!('ws_url' in options)) {
    return options;
  }

  const mqtt = isRecord(options['mqtt']) ? options['mqtt'] : {};
  const debug = isRecord(options['debug']) ? options['debug'] : {};
  const mappings = Array.isArray(options['mappings']) ? options['mappings'] : [];

  return dropUndefined({
    upstream: dropUndefined({
      url: options['ws_url'],
      headers: options['ws_headers'] ?? undefined,
    }),
    mqtt: dropUndefined({
      host: mqtt['host'],
      port: mqtt['port'],
      username: emptyToUndefined(mqtt['username']),
      password: emptyToUndefined(mqtt['password']),
      discoveryPrefix: mqtt['discovery_prefix'],
    }),
    baseTopic: options['base_topic'],
    device: dropUndefined({
      id: options['device_id'],
      name: options['device_name'],
    }),
    mappings: mappings.map((mapping) => (isRecord(mapping) ? normaliseAddonMapping(mapping) : mapping)),
    debug: dropUndefined({
      logRawFrames: debug['log_raw_frames'],
      rawFramesLimit: debug['raw_frames_limit'],
    }),
  });
}

function normaliseAddonMapping(mapping: ConfigRecord): ConfigRecord {
  return dropUndefined({
    uniqueId: mapping['unique_id'],
    name: mapping['name'],
    path: mapping['jsonpath'],
    transform: mapping['transform'],
    unit: emptyToUndefined(mapping['unit']),
    icon: emptyToUndefined(mapping['icon']),
    deviceClass: emptyToUndefined(mapping['device_class']),
    stateClass: emptyToUndefined(mapping['state_class']),
  });
}

function emptyToUndefined(value: unknown): unknown {
  return value === '' || value === null ? undefined : value;
}

function dropUndefined(record: ConfigRecord): ConfigRecord {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

// -----------------------------------------------------------------------------
// Environment Loading
// -----------------------------------------------------------------------------

/**
 * Load configuration from environment variables.
 *
 * Format: BRIDGE_<SECTION>_<KEY>=value
 * Examples:
 *   BRIDGE_UPSTREAM_URL=ws://192.168.1.50:9999
 *   BRIDGE_MQTT_HOST=core-mosquitto
 *   BRIDGE_LOGGING_LEVEL=debug
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const config: ConfigRecord = {};
  const prefix = 'BRIDGE_';

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || !value || key === DEFAULT_CONFIG_ENV_VAR) {
      continue;
    }

    const parts = key.substring(prefix.length).toLowerCase().split('_');

    setNestedValue(config, parts, parseEnvValue(value));
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

/**
 * Set a nested value in an object using a path array.
 */
function setNestedValue(obj: ConfigRecord, path: string[], value: unknown): void {
  let current = obj;

  for (const segment of path.slice(0, -1)) {
    const key = convertToCamelCase(segment);
    const existing = current[key];
    if (isRecord(existing)) {
      current = existing;
    } else {
      const child: ConfigRecord = {};
      current[key] = child;
      current = child;
    }
  }

  const last = path[path.length - 1];
  if (last !== undefined) {
    current[convertToCamelCase(last)] = value;
  }
}

/**
 * Convert a lowercased env key segment to its camelCase config key.
 */
function convertToCamelCase(str: string): string {
  const specialCases: Record<string, string> = {
    basetopic: 'baseTopic',
    handshaketimeout: 'handshakeTimeout',
    heartbeatinterval: 'heartbeatInterval',
    heartbeattimeout: 'heartbeatTimeout',
    initialdelay: 'initialDelay',
    maxdelay: 'maxDelay',
    clientidprefix: 'clientIdPrefix',
    reconnectperiod: 'reconnectPeriod',
    discoveryprefix: 'discoveryPrefix',
    lograwframes: 'logRawFrames',
    rawframeslimit: 'rawFramesLimit',
    checkinterval: 'checkInterval',
  };

  const lower = str.toLowerCase();
  return specialCases[lower] ?? lower;
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
export function deepMerge(...objects: ConfigRecord[]): ConfigRecord {
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
