/**
 * Connection Context
 *
 * Immutable bundle of the resource locators the provisioning layer hands
 * over. Built once per process and shared read-only by every component.
 */

import type { Config } from './schema.js';
import { loadEnv, getEnvRegion, type EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

export interface VectorStoreLocator {
  /** Aurora cluster ARN */
  readonly resourceArn: string;
  /** Database name inside the cluster */
  readonly database: string;
}

export interface ConnectionContext {
  readonly vectorStoreLocator?: VectorStoreLocator;
  /** Secrets Manager ARN for the vector store credentials */
  readonly credentialLocator?: string;
  /** Bucket name or S3 ARN holding the source documents */
  readonly objectStoreLocator?: string;
  readonly knowledgeBaseId: string;
  readonly modelId: string;
  readonly region: string;
}

export interface ConnectionContextInput {
  knowledgeBaseId: string;
  modelId: string;
  region: string;
  vectorStoreLocator?: VectorStoreLocator;
  credentialLocator?: string;
  objectStoreLocator?: string;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build a frozen context. Required locators must be non-blank.
 */
export function createConnectionContext(input: ConnectionContextInput): ConnectionContext {
  const missing: string[] = [];
  if (!input.knowledgeBaseId.trim()) missing.push('knowledge base id');
  if (!input.modelId.trim()) missing.push('model id');
  if (!input.region.trim()) missing.push('region');

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing connection settings: ${missing.join(', ')}`,
      'Set KB_ID / MODEL_ID / AWS_REGION or run: kbrag config set knowledge_base_id <id>'
    );
  }

  const vectorStoreLocator = input.vectorStoreLocator
    ? Object.freeze({ ...input.vectorStoreLocator })
    : undefined;

  return Object.freeze({
    knowledgeBaseId: input.knowledgeBaseId.trim(),
    modelId: input.modelId.trim(),
    region: input.region.trim(),
    vectorStoreLocator,
    credentialLocator: blankToUndefined(input.credentialLocator),
    objectStoreLocator: blankToUndefined(input.objectStoreLocator),
  });
}

/**
 * Options for resolving a context from config + environment.
 */
export interface ResolveContextOptions {
  /** Override the knowledge base id (e.g. --kb-id) */
  knowledgeBaseId?: string;
  /** Override the model id (e.g. --model) */
  modelId?: string;
  /** Override the region (e.g. --region) */
  region?: string;
  /** Environment values; defaults to the cached process environment */
  env?: EnvVars;
}

/**
 * Resolve a context. Precedence: explicit option > environment > config file.
 */
export function resolveConnectionContext(
  config: Config,
  options: ResolveContextOptions = {}
): ConnectionContext {
  const env = options.env ?? loadEnv();
  const envRegion = options.env ? (env.AWS_REGION ?? env.AWS_DEFAULT_REGION) : getEnvRegion();

  const resourceArn = env.RDS_RESOURCE_ARN ?? blankToUndefined(config.vector_store.resource_arn);
  const database = env.RDS_DATABASE ?? config.vector_store.database;

  return createConnectionContext({
    knowledgeBaseId: options.knowledgeBaseId ?? env.KB_ID ?? config.knowledge_base_id,
    modelId: options.modelId ?? env.MODEL_ID ?? config.model_id,
    region: options.region ?? envRegion ?? config.region,
    vectorStoreLocator: resourceArn ? { resourceArn, database } : undefined,
    credentialLocator: env.RDS_SECRET_ARN ?? config.vector_store.secret_arn,
    objectStoreLocator: env.UPLOAD_BUCKET_NAME ?? config.object_store.bucket,
  });
}
