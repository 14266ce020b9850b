/**
 * Configuration Loader
 * Merges defaults, a YAML file, VECTORSCOPE_* environment variables and
 * explicit options into one frozen connection configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError, type VectorScopeError } from '@vectorscope/core';
import type { ClientOptions, ConnectionConfig, Protocol } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked for in the working directory */
export const CONFIG_FILE_NAME = 'vectorscope.yaml';

/** Environment variable prefix */
const ENV_PREFIX = 'VECTORSCOPE_';

/** Values used when no other source supplies one */
export const DEFAULT_CONFIG: ConnectionConfig = Object.freeze({
  host: 'localhost',
  port: 8000,
  protocol: 'http',
  apiKey: undefined,
  tenant: 'default_tenant',
  database: 'default_database',
  timeout: 30000,
  maxRetries: 3,
  retryDelay: 200,
  maxConcurrent: 0,
  maxBatchSize: 1000,
  pageSize: 100,
  headers: Object.freeze({}),
});

/** Settings a file or explicit options may carry */
type Settings = {
  -readonly [K in keyof ConnectionConfig]?: ConnectionConfig[K];
};

// ============================================================
// VALIDATION
// ============================================================

function invalidConfig(reason: string, field?: string): VectorScopeError {
  return createError('VS-C001', {
    reason,
    ...(field !== undefined ? { field } : {}),
  });
}

function isProtocol(value: unknown): value is Protocol {
  return value === 'http' || value === 'https';
}

function expectString(value: unknown, key: string): string {
  if (typeof value !== 'string' || value === '') {
    throw invalidConfig(`${key} must be a non-empty string`, key);
  }
  return value;
}

function expectInteger(value: unknown, key: string, min: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalidConfig(`${key} must be an integer >= ${min}`, key);
  }
  return value;
}

/**
 * Validate one settings object (file contents or explicit options).
 * Keys with undefined values are skipped; unknown keys are rejected.
 */
function validateSettings(data: unknown, source: string): Settings {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw invalidConfig(`${source} must be a mapping`);
  }

  const settings: Settings = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) {
      continue;
    }
    switch (key) {
      case 'host':
      case 'tenant':
      case 'database':
      case 'apiKey':
        settings[key] = expectString(value, key);
        break;
      case 'protocol':
        if (!isProtocol(value)) {
          throw invalidConfig(`protocol must be 'http' or 'https'`, key);
        }
        settings.protocol = value;
        break;
      case 'port': {
        const port = expectInteger(value, key, 1);
        if (port > 65535) {
          throw invalidConfig('port must be an integer >= 1 and <= 65535', key);
        }
        settings.port = port;
        break;
      }
      case 'timeout':
      case 'maxBatchSize':
      case 'pageSize':
        settings[key] = expectInteger(value, key, 1);
        break;
      case 'maxRetries':
      case 'retryDelay':
      case 'maxConcurrent':
        settings[key] = expectInteger(value, key, 0);
        break;
      case 'headers':
        settings.headers = validateHeaders(value);
        break;
      default:
        throw invalidConfig(`unknown key ${key} in ${source}`, key);
    }
  }
  return settings;
}

function validateHeaders(value: unknown): Readonly<Record<string, string>> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalidConfig('headers must be a mapping of strings', 'headers');
  }
  const headers: Record<string, string> = {};
  for (const [name, header] of Object.entries(value)) {
    if (typeof header !== 'string') {
      throw invalidConfig(`header ${name} must be a string`, 'headers');
    }
    headers[name] = header;
  }
  return headers;
}

// ============================================================
// SOURCES
// ============================================================

/**
 * Load and validate a YAML configuration file.
 *
 * An empty file is an empty configuration. Keys use the option names
 * (`host`, `port`, `maxRetries`, ...).
 *
 * @throws ValidationError VS-C002 if the file cannot be read or parsed
 * @throws ValidationError VS-C001 if a value is invalid
 *
 * @example
 * ```yaml
 * host: vectors.internal
 * port: 8443
 * protocol: https
 * maxRetries: 5
 * ```
 */
export function loadConfigFile(path: string): Settings {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw createError('VS-C002', { path, reason });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw createError('VS-C002', { path, reason });
  }

  // yaml.parse returns null for empty content
  if (parsed === null || parsed === undefined) {
    return {};
  }
  return validateSettings(parsed, path);
}

function parseEnvInteger(raw: string, name: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw invalidConfig(`${name} must be an integer, got "${raw}"`, name);
  }
  return Number(raw.trim());
}

function parseEnvBoolean(raw: string, name: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  throw invalidConfig(`${name} must be a boolean, got "${raw}"`, name);
}

/**
 * Read VECTORSCOPE_* variables.
 *
 * Recognized: HOST, PORT, SSL, TENANT, DATABASE, TIMEOUT, API_KEY,
 * MAX_RETRIES. Empty values count as unset.
 */
export function readEnvConfig(
  env: Readonly<Record<string, string | undefined>>
): Settings {
  const get = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const raw: Record<string, unknown> = {
    host: get('HOST'),
    tenant: get('TENANT'),
    database: get('DATABASE'),
    apiKey: get('API_KEY'),
  };

  const port = get('PORT');
  if (port !== undefined) {
    raw['port'] = parseEnvInteger(port, `${ENV_PREFIX}PORT`);
  }
  const timeout = get('TIMEOUT');
  if (timeout !== undefined) {
    raw['timeout'] = parseEnvInteger(timeout, `${ENV_PREFIX}TIMEOUT`);
  }
  const maxRetries = get('MAX_RETRIES');
  if (maxRetries !== undefined) {
    raw['maxRetries'] = parseEnvInteger(maxRetries, `${ENV_PREFIX}MAX_RETRIES`);
  }
  const ssl = get('SSL');
  if (ssl !== undefined) {
    raw['protocol'] = parseEnvBoolean(ssl, `${ENV_PREFIX}SSL`)
      ? 'https'
      : 'http';
  }

  return validateSettings(raw, 'environment');
}

// ============================================================
// RESOLUTION
// ============================================================

/** Drop keys whose value is undefined so spreads do not erase lower layers */
function defined(settings: Settings): Settings {
  const result: Settings = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined) {
      Reflect.set(result, key, value);
    }
  }
  return result;
}

/**
 * Path of the configuration file in a directory, when one is there.
 */
export function findConfigFile(dir: string): string | undefined {
  const path = join(dir, CONFIG_FILE_NAME);
  return existsSync(path) ? path : undefined;
}

/**
 * Resolve the connection configuration.
 *
 * Precedence, lowest first: defaults, the YAML file named by
 * `options.configFile` (or VECTORSCOPE_CONFIG, or else vectorscope.yaml in
 * `options.cwd`), VECTORSCOPE_* environment variables, then explicit
 * options. An empty configFile reads no file. The result is frozen.
 *
 * @throws ValidationError (category config) on any invalid value
 *
 * @example
 * ```typescript
 * const config = resolveClientConfig({ host: 'localhost', port: 8000 });
 * config.timeout; // 30000 unless the file or environment override it
 * ```
 */
export function resolveClientConfig(
  options: ClientOptions = {}
): ConnectionConfig {
  const env = options.env ?? process.env;
  const configFile =
    options.configFile ??
    env[`${ENV_PREFIX}CONFIG`] ??
    findConfigFile(options.cwd ?? process.cwd());

  const fromFile =
    configFile !== undefined && configFile !== ''
      ? loadConfigFile(configFile)
      : {};
  const fromEnv = readEnvConfig(env);
  const explicit = validateSettings(
    {
      host: options.host,
      port: options.port,
      protocol: options.protocol,
      apiKey: options.apiKey,
      tenant: options.tenant,
      database: options.database,
      timeout: options.timeout,
      maxRetries: options.maxRetries,
      retryDelay: options.retryDelay,
      maxConcurrent: options.maxConcurrent,
      maxBatchSize: options.maxBatchSize,
      pageSize: options.pageSize,
      headers: options.headers,
    },
    'options'
  );

  const merged: ConnectionConfig = {
    ...DEFAULT_CONFIG,
    ...defined(fromFile),
    ...defined(fromEnv),
    ...defined(explicit),
  };
  return Object.freeze({
    ...merged,
    headers: Object.freeze({ ...merged.headers }),
  });
}

/** Base URL of the service, e.g. "http://localhost:8000" */
export function baseUrlOf(config: ConnectionConfig): string {
  return `${config.protocol}://${config.host}:${config.port}`;
}
