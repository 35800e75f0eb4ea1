/**
 * Environment Variable Handler
 *
 * Loads the locator overrides supplied by the provisioning layer.
 * Supports .env files for local development via dotenv.
 *
 * AWS credentials are NOT read here: the SDK's default provider chain
 * (env vars, shared config, instance role) resolves them.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Blank values count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * Every variable is optional. Missing locators are only an error when a
 * command actually needs them.
 */
export const EnvSchema = z.object({
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  KB_ID: optionalString,
  MODEL_ID: optionalString,
  RDS_RESOURCE_ARN: optionalString,
  RDS_SECRET_ARN: optionalString,
  RDS_DATABASE: optionalString,
  UPLOAD_BUCKET_NAME: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    AWS_REGION: process.env.AWS_REGION,
    AWS_DEFAULT_REGION: process.env.AWS_DEFAULT_REGION,
    KB_ID: process.env.KB_ID,
    MODEL_ID: process.env.MODEL_ID,
    RDS_RESOURCE_ARN: process.env.RDS_RESOURCE_ARN,
    RDS_SECRET_ARN: process.env.RDS_SECRET_ARN,
    RDS_DATABASE: process.env.RDS_DATABASE,
    UPLOAD_BUCKET_NAME: process.env.UPLOAD_BUCKET_NAME,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Region from AWS_REGION, then AWS_DEFAULT_REGION.
 */
export function getEnvRegion(): string | undefined {
  const env = loadEnv();
  return env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// CONFIG OVERRIDES
// ============================================================================

/**
 * Config keys the environment overrides, with their variables in
 * precedence order.
 */
export const ENV_OVERRIDES: Readonly<Record<string, ReadonlyArray<keyof EnvVars>>> = {
  region: ['AWS_REGION', 'AWS_DEFAULT_REGION'],
  knowledge_base_id: ['KB_ID'],
  model_id: ['MODEL_ID'],
  'vector_store.resource_arn': ['RDS_RESOURCE_ARN'],
  'vector_store.secret_arn': ['RDS_SECRET_ARN'],
  'vector_store.database': ['RDS_DATABASE'],
  'object_store.bucket': ['UPLOAD_BUCKET_NAME'],
};

export interface EnvOverride {
  variable: keyof EnvVars;
  value: string;
}

/**
 * The environment variable currently shadowing a config key, if any.
 */
export function envOverrideFor(key: string): EnvOverride | undefined {
  const env = loadEnv();
  for (const variable of ENV_OVERRIDES[key] ?? []) {
    const value = env[variable];
    if (value !== undefined) return { variable, value };
  }
  return undefined;
}
