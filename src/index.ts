/**
 * kb-rag - Library Entry Point
 *
 * The CLI (`kbrag`) covers everyday use. This module exports the pieces
 * for embedding the pipeline in another service.
 *
 * @example Answer a question
 * ```typescript
 * import { createConnectionContext, createRAGPipeline, createRetriever, createGenerator } from 'kb-rag';
 *
 * const context = createConnectionContext({
 *   knowledgeBaseId: 'KB123',
 *   modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
 *   region: 'us-west-2',
 * });
 * const pipeline = createRAGPipeline({
 *   context,
 *   retriever: createRetriever(context.region),
 *   generator: createGenerator(context.region),
 * });
 * const { result } = await pipeline.ask('How are refunds handled?');
 * ```
 *
 * @example Normalize results fetched elsewhere
 * ```typescript
 * import { normalize } from 'kb-rag';
 *
 * const passages = normalize(response.retrievalResults ?? []);
 * ```
 *
 * @packageDocumentation
 */

// Connection context and configuration
export {
  createConnectionContext,
  resolveConnectionContext,
  loadConfig,
  DEFAULT_CONFIG,
  type ConnectionContext,
  type ConnectionContextInput,
  type VectorStoreLocator,
  type Config,
} from './config/index.js';

// Retrieval and normalization
export * from './search/index.js';

// Generation and the pipeline
export * from './agent/index.js';

// Provider adapters and clients (SamplingParameters comes from agent)
export {
  ProviderRegistry,
  defaultProviderRegistry,
  createProviderRegistry,
  providerIdOf,
  BUILTIN_PROVIDERS,
  listTextModels,
  resetClients,
  type ProviderAdapter,
  type ProviderPrompt,
  type RequestBody,
  type TextModel,
  type RetrieveSender,
  type InvokeModelSender,
} from './providers/index.js';

// Diagnostics and sync
export * from './diagnostics/index.js';
export * from './ingestion/index.js';

// Errors
export {
  CLIError,
  ConfigError,
  ValidationError,
  RAGError,
  RAGErrorCodes,
  RetrievalError,
  GenerationError,
  UnsupportedProviderError,
  MalformedResponseError,
  SyncError,
  CatalogError,
  DiagnosticsError,
  classify,
  hintFor,
  formatError,
  ErrorCategories,
  type ClassifiedError,
  type ErrorCategory,
  type SourceComponent,
} from './errors/index.js';

// Logging, deadlines and table output
export * from './utils/index.js';

export type { GlobalOptions, CommandContext } from './cli/types.js';
