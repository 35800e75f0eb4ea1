/**
 * RAG pipeline errors
 *
 * Raised by the network-facing clients and the provider registry.
 * Each carries a structured code so callers (and the failure classifier)
 * can branch without parsing messages.
 */

export const RAGErrorCodes = {
  /** Knowledge-base retrieve call failed */
  RETRIEVAL_FAILED: 'RETRIEVAL_FAILED',
  /** Model invocation failed */
  GENERATION_FAILED: 'GENERATION_FAILED',
  /** No registry entry for the model's provider */
  UNSUPPORTED_PROVIDER: 'UNSUPPORTED_PROVIDER',
  /** Model response did not have the provider's expected shape */
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  /** Knowledge-base ingestion job failed or timed out */
  SYNC_FAILED: 'SYNC_FAILED',
  /** Foundation model listing failed */
  CATALOG_FAILED: 'CATALOG_FAILED',
  /** A diagnostics call (object listing, vector-table query) failed */
  DIAGNOSTICS_FAILED: 'DIAGNOSTICS_FAILED',
} as const;

export type RAGErrorCode = (typeof RAGErrorCodes)[keyof typeof RAGErrorCodes];

/**
 * Base class for pipeline errors.
 *
 * `cause` holds whatever the underlying SDK threw, unmodified.
 */
export class RAGError extends Error {
  public readonly code: RAGErrorCode;

  constructor(code: RAGErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'RAGError';
    this.code = code;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * The knowledge-base retrieval call failed.
 */
export class RetrievalError extends RAGError {
  constructor(cause: unknown) {
    super(
      RAGErrorCodes.RETRIEVAL_FAILED,
      `Knowledge base retrieval failed: ${describeCause(cause)}`,
      cause
    );
    this.name = 'RetrievalError';
  }
}

/**
 * The foundation-model invocation failed.
 */
export class GenerationError extends RAGError {
  constructor(cause: unknown) {
    super(
      RAGErrorCodes.GENERATION_FAILED,
      `Model invocation failed: ${describeCause(cause)}`,
      cause
    );
    this.name = 'GenerationError';
  }
}

/**
 * No provider in the registry understands this model id.
 *
 * A configuration error: retrying cannot fix it.
 */
export class UnsupportedProviderError extends RAGError {
  public readonly modelId: string;

  constructor(modelId: string) {
    super(
      RAGErrorCodes.UNSUPPORTED_PROVIDER,
      `Unsupported model provider for model id "${modelId}"`
    );
    this.name = 'UnsupportedProviderError';
    this.modelId = modelId;
  }
}

/**
 * The model answered, but not in the envelope its provider entry expects.
 */
export class MalformedResponseError extends RAGError {
  public readonly modelId: string;

  constructor(modelId: string, detail?: string) {
    super(
      RAGErrorCodes.MALFORMED_RESPONSE,
      `Malformed response from model "${modelId}"${detail ? `: ${detail}` : ''}`
    );
    this.name = 'MalformedResponseError';
    this.modelId = modelId;
  }
}

/**
 * A knowledge-base ingestion job ended badly or never finished.
 */
export class SyncError extends RAGError {
  public readonly knowledgeBaseId: string;

  constructor(knowledgeBaseId: string, reason: string, cause?: unknown) {
    super(
      RAGErrorCodes.SYNC_FAILED,
      `Sync of knowledge base "${knowledgeBaseId}" failed: ${reason}`,
      cause
    );
    this.name = 'SyncError';
    this.knowledgeBaseId = knowledgeBaseId;
  }
}

/**
 * Listing foundation models failed.
 */
export class CatalogError extends RAGError {
  constructor(region: string, cause: unknown) {
    super(
      RAGErrorCodes.CATALOG_FAILED,
      `Listing foundation models in ${region} failed: ${describeCause(cause)}`,
      cause
    );
    this.name = 'CatalogError';
  }
}

/**
 * A diagnostics call failed. `operation` names the call ("ListObjectsV2").
 */
export class DiagnosticsError extends RAGError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(RAGErrorCodes.DIAGNOSTICS_FAILED, `${operation} failed: ${describeCause(cause)}`, cause);
    this.name = 'DiagnosticsError';
    this.operation = operation;
  }
}
