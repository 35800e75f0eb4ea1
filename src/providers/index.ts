/**
 * Providers Module
 *
 * Model-family adapters, the registry that resolves them from a model id,
 * the AWS SDK client factory and the foundation model catalog.
 */

export {
  ProviderRegistry,
  defaultProviderRegistry,
  createProviderRegistry,
  providerIdOf,
  BUILTIN_PROVIDERS,
} from './registry.js';

export { anthropicProvider, ANTHROPIC_BEDROCK_VERSION } from './anthropic.js';
export { amazonProvider, isNovaModel } from './amazon.js';
export { metaProvider, llama3Prompt } from './meta.js';
export { mistralProvider } from './mistral.js';
export { cohereProvider } from './cohere.js';

export { listTextModels, type TextModel, type ListTextModelsOptions } from './models.js';

export {
  getAgentRuntimeClient,
  getRuntimeClient,
  getAgentClient,
  getBedrockClient,
  getS3Client,
  getRdsDataClient,
  resetClients,
  type SendOptions,
  type RetrieveSender,
  type InvokeModelSender,
  type IngestionSender,
  type FoundationModelSender,
  type ListObjectsSender,
  type StatementSender,
} from './clients.js';

export type { ProviderAdapter, ProviderPrompt, RequestBody, SamplingParameters } from './types.js';
