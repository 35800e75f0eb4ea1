/**
 * Configuration Schema
 *
 * Defines the shape of ~/.kbrag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Vector store locators (Aurora cluster reached through the RDS Data API).
 * Only the diagnostics commands talk to it directly.
 */
export const VectorStoreConfigSchema = z.object({
  resource_arn: z.string().describe('Aurora cluster ARN'),
  secret_arn: z.string().describe('Secrets Manager ARN holding the database credentials'),
  database: z.string().min(1).describe('Database name'),
  table: z
    .string()
    .regex(
      /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/,
      'table must be a plain or schema-qualified identifier'
    )
    .describe('Vector table populated by the knowledge base'),
});

/**
 * Object store holding the source documents
 */
export const ObjectStoreConfigSchema = z.object({
  bucket: z.string().describe('Bucket name or arn:aws:s3:::bucket ARN'),
});

/**
 * Retrieval settings
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of passages to retrieve'),
});

/**
 * Generation sampling and prompt budget
 */
export const GenerationConfigSchema = z.object({
  temperature: z.number().min(0).max(1),
  top_p: z.number().min(0).max(1),
  max_tokens: z.number().int().min(1).max(8192).describe('Maximum tokens to generate'),
  context_token_budget: z
    .number()
    .int()
    .min(100)
    .max(200000)
    .describe('Estimated token budget for the system instruction plus query'),
});

/**
 * Per-request policy applied by the CLI around each network call
 */
export const RequestConfigSchema = z.object({
  timeout_ms: z.number().int().min(1000).max(600000),
  max_attempts: z.number().int().min(1).max(10),
  base_delay_ms: z.number().int().min(0).max(60000),
});

/**
 * Optional query guard that classifies questions before retrieval
 */
export const GuardConfigSchema = z.object({
  enabled: z.boolean(),
  model_id: z.string().optional().describe('Model used for classification (defaults to model_id)'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  region: z.string().min(1).describe('AWS region of the knowledge base and models'),
  knowledge_base_id: z.string().describe('Knowledge base identifier'),
  model_id: z.string().min(1).describe('Foundation model used for answers'),
  vector_store: VectorStoreConfigSchema,
  object_store: ObjectStoreConfigSchema,
  retrieval: RetrievalConfigSchema,
  generation: GenerationConfigSchema,
  request: RequestConfigSchema,
  guard: GuardConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
