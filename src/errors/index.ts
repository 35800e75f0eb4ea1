/**
 * Error handling module
 *
 * This module exports:
 * - CLI error classes (hint + exit code)
 * - Pipeline error classes (structured code + cause)
 * - The failure classifier
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Missing knowledge base id', 'Set KB_ID');
 */

// CLI error types
export { CLIError, ConfigError, ValidationError } from './types.js';

// Pipeline error types
export {
  RAGError,
  RAGErrorCodes,
  RetrievalError,
  GenerationError,
  UnsupportedProviderError,
  MalformedResponseError,
  SyncError,
  CatalogError,
  DiagnosticsError,
  type RAGErrorCode,
} from './rag.js';

// Failure classification
export {
  classify,
  hintFor,
  isRetryableCategory,
  ErrorCategories,
  CATEGORY_HINTS,
  type ClassifiedError,
  type ErrorCategory,
  type SourceComponent,
} from './classifier.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  RAG_ERROR_EXIT_CODE,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
