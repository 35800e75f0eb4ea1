/**
 * Response Extractor
 *
 * Reads the answer out of a decoded model response using the provider's
 * envelope, and resolves which passages the answer cites.
 */

import { MalformedResponseError } from '../errors/index.js';
import { defaultProviderRegistry, type ProviderRegistry } from '../providers/registry.js';
import type { Passage } from '../search/types.js';
import { resolveCitations } from './citations.js';
import type { GenerationResult, RawGenerationResponse } from './types.js';

/**
 * Extract the answer.
 *
 * @param passages - The request's context passages, in label order
 * @throws {UnsupportedProviderError} When no adapter matches `modelId`
 * @throws {MalformedResponseError} When the envelope has no usable text
 */
export function extract(
  raw: RawGenerationResponse,
  modelId: string,
  passages: readonly Passage[] = [],
  registry: ProviderRegistry = defaultProviderRegistry
): GenerationResult {
  const adapter = registry.resolve(modelId);
  const text = adapter.extractText(raw.body);

  if (text === undefined) {
    throw new MalformedResponseError(modelId, `no ${adapter.displayName} answer in response body`);
  }

  const answerText = text.trim();
  if (!answerText) {
    throw new MalformedResponseError(modelId, 'answer text is empty');
  }

  return {
    answerText,
    citedPassages: resolveCitations(answerText, passages),
    rawLatencyMs: raw.latencyMs,
  };
}
