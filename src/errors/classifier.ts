/**
 * Failure Classifier
 *
 * Maps errors raised by the retrieval and generation clients to an
 * actionable category. The `retryable` flag it produces is the only input
 * a caller-level retry loop uses; the classifier itself never retries.
 *
 * Signals read from the error, in order:
 * 1. Pipeline programming errors (unsupported provider, malformed response)
 * 2. Service error codes (`name`, `code`, `Code`, `__type`)
 * 3. Abort/timeout markers and Node network error codes
 * 4. HTTP status (`$metadata.httpStatusCode`, `statusCode`, `status`)
 * 5. The SDK's own `$retryable` hint
 *
 * @example
 * ```typescript
 * try {
 *   await generate(context, request);
 * } catch (error) {
 *   const classified = classify(error, 'generation');
 *   if (classified.retryable) scheduleRetry();
 * }
 * ```
 */

import { z } from 'zod';
import { RAGError, UnsupportedProviderError, MalformedResponseError } from './rag.js';
import { ConfigError, ValidationError } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export const ErrorCategories = {
  Permission: 'Permission',
  Throttled: 'Throttled',
  NotFound: 'NotFound',
  MalformedInput: 'MalformedInput',
  Transient: 'Transient',
  Unknown: 'Unknown',
} as const;

export type ErrorCategory = (typeof ErrorCategories)[keyof typeof ErrorCategories];

/** The pipeline step an error came from */
export type SourceComponent =
  | 'retrieval'
  | 'generation'
  | 'guard'
  | 'diagnostics'
  | 'sync'
  | 'catalog';

export interface ClassifiedError {
  category: ErrorCategory;
  retryable: boolean;
  originalMessage: string;
  sourceComponent: SourceComponent;
}

// ============================================================================
// SIGNAL TABLES
// ============================================================================

const PERMISSION_CODES = new Set([
  'AccessDeniedException',
  'AccessDenied',
  'UnauthorizedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'InvalidSignatureException',
  'CredentialsProviderError',
]);

const THROTTLING_CODES = new Set([
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'ServiceQuotaExceededException',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'SlowDown',
]);

const NOT_FOUND_CODES = new Set([
  'ResourceNotFoundException',
  'NotFoundException',
  'NoSuchBucket',
  'NoSuchKey',
]);

const MALFORMED_INPUT_CODES = new Set([
  'ValidationException',
  'BadRequestException',
  'ModelErrorException',
  'ConflictException',
]);

const TRANSIENT_CODES = new Set([
  'ModelTimeoutException',
  'ModelNotReadyException',
  'ServiceUnavailableException',
  'ServiceUnavailable',
  'InternalServerException',
  'InternalFailure',
  'InternalError',
  'DependencyFailedException',
  'BadGatewayException',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
  'AbortError',
]);

/** Node.js socket-level error codes that indicate a transient network fault */
const NETWORK_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_MESSAGE_PATTERN = /timed?[\s-]?out|socket hang up|connection reset/i;

/**
 * Human-readable hints for each category.
 *
 * Presentation helper for hosting applications; not part of the
 * classification decision.
 */
export const CATEGORY_HINTS: Record<ErrorCategory, string> = {
  Permission: 'Check IAM permissions and model access for the configured role',
  Throttled: 'Request rate exceeded; retry after a short wait',
  NotFound: 'Check the knowledge base id, model id and region',
  MalformedInput: 'Check the request parameters and the configured model id',
  Transient: 'The service is temporarily unavailable; retrying may help',
  Unknown: 'Run with --verbose for more details',
};

// ============================================================================
// SIGNAL EXTRACTION
// ============================================================================

/**
 * Loose view of the fields AWS SDK v3 service exceptions and Node network
 * errors carry. Every field is optional; unknown shapes parse to `{}`.
 */
const ErrorSignalsSchema = z
  .object({
    name: z.string().optional(),
    code: z.union([z.string(), z.number()]).optional(),
    Code: z.string().optional(),
    __type: z.string().optional(),
    message: z.string().optional(),
    statusCode: z.number().optional(),
    status: z.number().optional(),
    $metadata: z.object({ httpStatusCode: z.number().optional() }).passthrough().optional(),
    $retryable: z.object({ throttling: z.boolean().optional() }).passthrough().optional(),
  })
  .passthrough();

type ErrorSignals = z.infer<typeof ErrorSignalsSchema>;

function readSignals(error: unknown): ErrorSignals {
  if (error === null || typeof error !== 'object') {
    return {};
  }
  // Error properties like `name` and `message` live on the prototype chain,
  // so copy them explicitly before parsing.
  const record: Record<string, unknown> = { ...error };
  if (error instanceof Error) {
    record.name = error.name;
    record.message = error.message;
  }
  const parsed = ErrorSignalsSchema.safeParse(record);
  return parsed.success ? parsed.data : {};
}

/**
 * `__type` arrives as "namespace#Code" on some JSON protocols.
 */
function stripNamespace(code: string): string {
  const hashIndex = code.lastIndexOf('#');
  const withoutNamespace = hashIndex >= 0 ? code.slice(hashIndex + 1) : code;
  return withoutNamespace.split(':')[0] ?? withoutNamespace;
}

function collectCodes(signals: ErrorSignals): string[] {
  const codes: string[] = [];
  for (const value of [signals.name, signals.code, signals.Code, signals.__type]) {
    if (typeof value === 'string' && value.length > 0) {
      codes.push(stripNamespace(value));
    }
  }
  return codes;
}

function statusOf(signals: ErrorSignals): number | undefined {
  return signals.$metadata?.httpStatusCode ?? signals.statusCode ?? signals.status;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  const signals = readSignals(error);
  return signals.message ?? String(error);
}

function isWrapper(error: unknown): error is RAGError {
  return (
    error instanceof RAGError &&
    !(error instanceof UnsupportedProviderError) &&
    !(error instanceof MalformedResponseError)
  );
}

/**
 * Unwrap pipeline wrappers so the SDK's own error drives classification.
 */
function innermost(error: unknown): unknown {
  let current = error;
  while (isWrapper(current) && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Errors raised before or after the call because the request itself is
 * wrong: schema mismatches, rejected input, missing configuration.
 * Sending the same request again cannot succeed.
 */
function isRequestMismatch(
  error: unknown
): error is UnsupportedProviderError | MalformedResponseError | ValidationError | ConfigError {
  return (
    error instanceof UnsupportedProviderError ||
    error instanceof MalformedResponseError ||
    error instanceof ValidationError ||
    error instanceof ConfigError
  );
}

function categoryFromCodes(codes: string[]): ErrorCategory | undefined {
  if (codes.some((c) => PERMISSION_CODES.has(c))) return ErrorCategories.Permission;
  if (codes.some((c) => THROTTLING_CODES.has(c))) return ErrorCategories.Throttled;
  if (codes.some((c) => NOT_FOUND_CODES.has(c))) return ErrorCategories.NotFound;
  if (codes.some((c) => MALFORMED_INPUT_CODES.has(c))) return ErrorCategories.MalformedInput;
  if (codes.some((c) => TRANSIENT_CODES.has(c) || NETWORK_ERROR_CODES.has(c))) {
    return ErrorCategories.Transient;
  }
  return undefined;
}

function categoryFromStatus(status: number | undefined): ErrorCategory | undefined {
  if (status === undefined) return undefined;
  if (status === 401 || status === 403) return ErrorCategories.Permission;
  if (status === 429) return ErrorCategories.Throttled;
  if (status === 404) return ErrorCategories.NotFound;
  if (status === 408) return ErrorCategories.Transient;
  if (status === 400 || status === 413 || status === 422) return ErrorCategories.MalformedInput;
  if (status >= 500 && status <= 599) return ErrorCategories.Transient;
  return undefined;
}

/**
 * Whether a category is worth retrying.
 *
 * Unknown errors count as retryable.
 */
export function isRetryableCategory(category: ErrorCategory): boolean {
  switch (category) {
    case 'Throttled':
    case 'Transient':
    case 'Unknown':
      return true;
    case 'Permission':
    case 'NotFound':
    case 'MalformedInput':
      return false;
  }
}

function result(
  category: ErrorCategory,
  originalMessage: string,
  sourceComponent: SourceComponent
): ClassifiedError {
  return {
    category,
    retryable: isRetryableCategory(category),
    originalMessage,
    sourceComponent,
  };
}

/**
 * Classify an error raised by a pipeline component.
 *
 * @param error - Anything thrown by a client call
 * @param sourceComponent - Which step raised it
 */
export function classify(error: unknown, sourceComponent: SourceComponent): ClassifiedError {
  if (isRequestMismatch(error)) {
    return result(ErrorCategories.MalformedInput, error.message, sourceComponent);
  }

  const inner = innermost(error);
  const originalMessage = messageOf(inner);

  if (isRequestMismatch(inner)) {
    return result(ErrorCategories.MalformedInput, originalMessage, sourceComponent);
  }

  const signals = readSignals(inner);
  const codes = collectCodes(signals);

  const byCode = categoryFromCodes(codes);
  if (byCode) return result(byCode, originalMessage, sourceComponent);

  const byStatus = categoryFromStatus(statusOf(signals));
  if (byStatus) return result(byStatus, originalMessage, sourceComponent);

  if (signals.$retryable) {
    const category = signals.$retryable.throttling
      ? ErrorCategories.Throttled
      : ErrorCategories.Transient;
    return result(category, originalMessage, sourceComponent);
  }

  if (TRANSIENT_MESSAGE_PATTERN.test(originalMessage)) {
    return result(ErrorCategories.Transient, originalMessage, sourceComponent);
  }

  return result(ErrorCategories.Unknown, originalMessage, sourceComponent);
}

/**
 * Recovery hint for a classified error.
 */
export function hintFor(classified: ClassifiedError): string {
  return CATEGORY_HINTS[classified.category];
}
