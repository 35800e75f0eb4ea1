/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.kbrag)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getKbragDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function ensureKbragDir(): void {
  const dir = getKbragDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects merge key by key; arrays and primitives replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge a partial user config over the defaults and validate the result.
 */
function resolveConfig(userConfig: PlainObject, configPath: string): Config {
  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error)}`,
      `Fix ${configPath} or run: kbrag config reset --force`
    );
  }
  return merged.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the template on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureKbragDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return ConfigSchema.parse(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: kbrag config reset --force`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error)}`,
      'Run: kbrag config reset --force  to restore defaults'
    );
  }

  return resolveConfig(validationResult.data, configPath);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('retrieval.top_k') => 3
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
export function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  ensureKbragDir();

  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key', 'Run: kbrag config list  to see available keys');
  }

  let config: PlainObject = {};
  if (fs.existsSync(configPath)) {
    const parsed: unknown = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
    if (isPlainObject(parsed)) {
      config = parsed;
    }
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error)}`,
      'Run: kbrag config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 3]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}

/**
 * Delete the config file and write a fresh template.
 */
export function resetConfig(): void {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  loadConfig(true);
}
