/**
 * Prompt Assembler
 *
 * Turns passages and a query into a provider-neutral GenerationRequest,
 * then (via the provider registry) into the InvokeModel body.
 *
 * OUTPUT FORMAT (system instruction):
 * ```
 * You are a helpful assistant that answers questions ...
 *
 * Context:
 *
 * [1] (source: s3://docs/refunds.md)
 * Refunds are issued within 14 days.
 *
 * [2] (source: unknown)
 * ...
 *
 * Answer the question using only the context above ...
 * ```
 *
 * The request is kept within a token budget by dropping whole passages,
 * lowest score first (last first when any passage is unscored).
 *
 * @example
 * ```typescript
 * const request = assemble(context, 'What is the refund window?', passages, {
 *   temperature: 0,
 *   maxTokens: 512,
 *   topP: 1,
 * });
 * const body = buildRequestBody(request);
 * ```
 */

import { z } from 'zod';

import type { ConnectionContext } from '../config/context.js';
import { ValidationError } from '../errors/index.js';
import { defaultProviderRegistry, type ProviderRegistry } from '../providers/registry.js';
import type { RequestBody } from '../providers/types.js';
import type { Passage } from '../search/types.js';
import { SamplingParametersSchema, type GenerationRequest, type SamplingParameters } from './types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const DEFAULT_SYSTEM_TEMPLATE =
  'You are a helpful assistant that answers questions about the documents in a knowledge base.';

export const ANSWER_INSTRUCTION =
  'Answer the question using only the context above. Cite the passages you use by their labels, ' +
  'for example [1]. If the context does not contain the answer, say that you do not know.';

export const NO_CONTEXT_NOTICE = 'No relevant context was found in the knowledge base.';

export const AssemblerOptionsSchema = z.object({
  tokenBudget: z
    .number()
    .int('tokenBudget must be an integer')
    .min(1, 'tokenBudget must be at least 1')
    .optional(),
  systemTemplate: z.string().min(1, 'systemTemplate must not be empty').optional(),
});

export interface AssemblerOptions extends z.infer<typeof AssemblerOptionsSchema> {
  /** Registry to resolve the provider from; defaults to the built-ins */
  registry?: ProviderRegistry;
}

export const DEFAULT_TOKEN_BUDGET = 4000;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Token estimate used for budgeting: ceil(characters / 4).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function formatPassageBlock(passage: Passage, label: number): string {
  return `[${label}] (source: ${passage.sourceLocator ?? 'unknown'})\n${passage.text}`;
}

export function buildSystemInstruction(
  passages: readonly Passage[],
  template: string = DEFAULT_SYSTEM_TEMPLATE
): string {
  const context =
    passages.length > 0
      ? passages.map((passage, i) => formatPassageBlock(passage, i + 1)).join('\n\n')
      : NO_CONTEXT_NOTICE;
  return [template, 'Context:', context, ANSWER_INSTRUCTION].join('\n\n');
}

/**
 * Index of the passage to drop next.
 *
 * Lowest score when every passage is scored (the later one on ties),
 * otherwise the last passage.
 */
function dropIndex(passages: readonly Passage[]): number {
  let victim = passages.length - 1;
  let lowest = Number.POSITIVE_INFINITY;

  for (let i = 0; i < passages.length; i++) {
    const score = passages[i]?.score;
    if (score === undefined) return passages.length - 1;
    if (score <= lowest) {
      lowest = score;
      victim = i;
    }
  }
  return victim;
}

// ============================================================================
// ASSEMBLE
// ============================================================================

/**
 * Build a frozen GenerationRequest.
 *
 * @throws {UnsupportedProviderError} Before anything is built, when the model's provider is unknown
 * @throws {ValidationError} When the query is blank or sampling parameters are out of range
 */
export function assemble(
  context: ConnectionContext,
  query: string,
  passages: readonly Passage[],
  samplingParameters: SamplingParameters,
  options: AssemblerOptions = {}
): GenerationRequest {
  const registry = options.registry ?? defaultProviderRegistry;
  const adapter = registry.resolve(context.modelId);

  const userQuery = query.trim();
  if (!userQuery) {
    throw new ValidationError('Query must not be empty');
  }

  const sampling = SamplingParametersSchema.safeParse(samplingParameters);
  if (!sampling.success) {
    throw new ValidationError(
      'Invalid sampling parameters',
      sampling.error.issues.map((issue) => issue.message)
    );
  }

  const parsedOptions = AssemblerOptionsSchema.safeParse({
    tokenBudget: options.tokenBudget,
    systemTemplate: options.systemTemplate,
  });
  if (!parsedOptions.success) {
    throw new ValidationError(
      'Invalid assembler options',
      parsedOptions.error.issues.map((issue) => issue.message)
    );
  }
  const budget = parsedOptions.data.tokenBudget ?? DEFAULT_TOKEN_BUDGET;
  const template = parsedOptions.data.systemTemplate ?? DEFAULT_SYSTEM_TEMPLATE;

  const kept = [...passages];
  let systemInstruction = buildSystemInstruction(kept, template);
  let estimatedTokens = estimateTokens(systemInstruction + userQuery);

  while (estimatedTokens > budget && kept.length > 0) {
    kept.splice(dropIndex(kept), 1);
    systemInstruction = buildSystemInstruction(kept, template);
    estimatedTokens = estimateTokens(systemInstruction + userQuery);
  }

  return Object.freeze({
    modelId: context.modelId,
    providerId: adapter.id,
    systemInstruction,
    contextPassages: Object.freeze(kept),
    userQuery,
    samplingParameters: Object.freeze({ ...sampling.data }),
    estimatedTokens,
  });
}

/**
 * Provider-specific InvokeModel body for a request.
 */
export function buildRequestBody(
  request: GenerationRequest,
  registry: ProviderRegistry = defaultProviderRegistry
): RequestBody {
  return registry.resolve(request.modelId).buildRequest(request.modelId, {
    systemInstruction: request.systemInstruction,
    userQuery: request.userQuery,
    samplingParameters: { ...request.samplingParameters },
  });
}
