/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 * KBRAG_HOME points at a temp directory so the real ~/.kbrag is never touched.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import TOML from '@iarna/toml';

import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import {
  deepMerge,
  parseValue,
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
} from '../loader.js';
import { getConfigPath, getKbragDir } from '../paths.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects top_k outside valid range', () => {
    const invalid = { ...DEFAULT_CONFIG, retrieval: { top_k: 200 } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects a table name that is not an identifier', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      vector_store: { ...DEFAULT_CONFIG.vector_store, table: 'kb; DROP TABLE x' },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config', () => {
    expect(PartialConfigSchema.safeParse({ generation: { max_tokens: 256 } }).success).toBe(true);
  });
});

describe('deepMerge', () => {
  it('merges nested objects key by key', () => {
    const merged = deepMerge(
      { a: 1, nested: { x: 1, y: 2 } },
      { nested: { y: 3 }, b: 'two' }
    );

    expect(merged).toEqual({ a: 1, b: 'two', nested: { x: 1, y: 3 } });
  });

  it('replaces arrays and skips undefined', () => {
    expect(deepMerge({ list: [1, 2], keep: true }, { list: [3], keep: undefined })).toEqual({
      list: [3],
      keep: true,
    });
  });
});

describe('parseValue', () => {
  it.each([
    ['true', true],
    ['FALSE', false],
    ['42', 42],
    ['0.5', 0.5],
    ['anthropic.claude-3-haiku-20240307-v1:0', 'anthropic.claude-3-haiku-20240307-v1:0'],
    ['   ', '   '],
  ])('%j → %j', (raw, expected) => {
    expect(parseValue(raw)).toBe(expected);
  });
});

describe('config file', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'kbrag-config-'));
    vi.stubEnv('KBRAG_HOME', home);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('resolves paths under KBRAG_HOME', () => {
    expect(getKbragDir()).toBe(home);
    expect(getConfigPath()).toBe(path.join(home, 'config.toml'));
  });

  it('writes the template on first load and returns the defaults', () => {
    const config = loadConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.existsSync(getConfigPath())).toBe(true);
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('does not create the file when asked not to', () => {
    loadConfig(false);

    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('merges a sparse file over the defaults', () => {
    fs.writeFileSync(getConfigPath(), 'knowledge_base_id = "KB123"\n[retrieval]\ntop_k = 8\n');

    const config = loadConfig();

    expect(config.knowledge_base_id).toBe('KB123');
    expect(config.retrieval.top_k).toBe(8);
    expect(config.generation).toEqual(DEFAULT_CONFIG.generation);
  });

  it('reports TOML syntax errors as ConfigError', () => {
    fs.writeFileSync(getConfigPath(), 'region = ');

    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow(/^Invalid TOML in config file/);
  });

  it('reports schema violations with the offending path', () => {
    fs.writeFileSync(getConfigPath(), '[request]\nmax_attempts = 50\n');

    expect(() => loadConfig()).toThrow(/request\.max_attempts/);
  });

  it('sets and reads back a nested value', () => {
    setConfigValue('retrieval.top_k', '7');

    expect(getConfigValue('retrieval.top_k')).toBe(7);
    const written = TOML.parse(fs.readFileSync(getConfigPath(), 'utf-8'));
    expect(written).toEqual({ retrieval: { top_k: 7 } });
  });

  it('refuses values that fail validation and leaves the file alone', () => {
    expect(() => setConfigValue('retrieval.top_k', '500')).toThrow(
      /^Invalid value for 'retrieval\.top_k'/
    );
    expect(() => setConfigValue('model_id', 'true')).toThrow(ConfigError);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('rejects an empty key', () => {
    expect(() => setConfigValue('', 'x')).toThrow('Invalid config key: empty key');
  });

  it('returns undefined for unknown keys', () => {
    expect(getConfigValue('retrieval.nope')).toBeUndefined();
    expect(getConfigValue('model_id.deeper')).toBeUndefined();
  });

  it('lists flattened entries', () => {
    const entries = new Map(listConfig());

    expect(entries.get('region')).toBe('us-west-2');
    expect(entries.get('request.timeout_ms')).toBe(60000);
    expect(entries.get('guard.enabled')).toBe(false);
    expect(entries.has('retrieval')).toBe(false);
  });

  it('reset restores the template', () => {
    setConfigValue('region', 'eu-central-1');

    resetConfig();

    expect(loadConfig().region).toBe('us-west-2');
  });
});
