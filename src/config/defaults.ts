/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  region: 'us-west-2',
  // Filled in from infrastructure outputs (or KB_ID)
  knowledge_base_id: '',
  model_id: 'anthropic.claude-3-haiku-20240307-v1:0',

  vector_store: {
    resource_arn: '',
    secret_arn: '',
    database: 'myapp',
    table: 'bedrock_integration.bedrock_kb',
  },

  object_store: {
    bucket: '',
  },

  retrieval: {
    top_k: 3,
  },

  generation: {
    temperature: 0,
    top_p: 1,
    max_tokens: 512,
    context_token_budget: 4000,
  },

  request: {
    timeout_ms: 60000,
    max_attempts: 3,
    base_delay_ms: 500,
  },

  guard: {
    enabled: false,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.kbrag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# kbrag Configuration
# Location: ~/.kbrag/config.toml
# Environment variables (KB_ID, MODEL_ID, AWS_REGION, RDS_RESOURCE_ARN,
# RDS_SECRET_ARN, RDS_DATABASE, UPLOAD_BUCKET_NAME) override these values.

region = "${DEFAULT_CONFIG.region}"
knowledge_base_id = ""
model_id = "${DEFAULT_CONFIG.model_id}"

# Aurora vector store (diagnostics only)
[vector_store]
resource_arn = ""
secret_arn = ""
database = "${DEFAULT_CONFIG.vector_store.database}"
table = "${DEFAULT_CONFIG.vector_store.table}"

# Document bucket (diagnostics only)
[object_store]
bucket = ""

[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}

[generation]
temperature = ${DEFAULT_CONFIG.generation.temperature.toFixed(1)}
top_p = ${DEFAULT_CONFIG.generation.top_p.toFixed(1)}
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
context_token_budget = ${DEFAULT_CONFIG.generation.context_token_budget}

# Timeout and retry policy for each service call
[request]
timeout_ms = ${DEFAULT_CONFIG.request.timeout_ms}
max_attempts = ${DEFAULT_CONFIG.request.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.request.base_delay_ms}

# Classify questions before answering; only on-topic questions are answered
[guard]
enabled = ${DEFAULT_CONFIG.guard.enabled}
# model_id = "anthropic.claude-3-haiku-20240307-v1:0"
`;
