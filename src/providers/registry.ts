/**
 * Provider Registry
 *
 * Maps a model id to the adapter that builds its request body and reads
 * its response. The provider id is the vendor segment of the model id:
 *
 *   anthropic.claude-3-haiku-20240307-v1:0     → anthropic
 *   us.meta.llama3-2-11b-instruct-v1:0          → meta (inference profile)
 *
 * @example
 * ```typescript
 * const adapter = defaultProviderRegistry.resolve(context.modelId);
 * const body = adapter.buildRequest(context.modelId, prompt);
 * ```
 */

import { UnsupportedProviderError } from '../errors/index.js';
import { amazonProvider } from './amazon.js';
import { anthropicProvider } from './anthropic.js';
import { cohereProvider } from './cohere.js';
import { metaProvider } from './meta.js';
import { mistralProvider } from './mistral.js';
import type { ProviderAdapter } from './types.js';

/** Geographic prefixes of cross-region inference profile ids */
const INFERENCE_PROFILE_PREFIXES = new Set(['us', 'eu', 'apac', 'global', 'us-gov', 'ca', 'jp', 'au']);

export const BUILTIN_PROVIDERS: readonly ProviderAdapter[] = [
  anthropicProvider,
  amazonProvider,
  metaProvider,
  mistralProvider,
  cohereProvider,
];

/**
 * Vendor segment of a model id, ignoring an inference-profile prefix.
 *
 * Returns an empty string for an empty id.
 */
export function providerIdOf(modelId: string): string {
  // Model ARNs end in ".../<model id>"
  const bare = modelId.trim().split('/').pop() ?? '';
  const segments = bare.split('.');
  const [first = '', second] = segments;
  if (second !== undefined && INFERENCE_PROFILE_PREFIXES.has(first.toLowerCase())) {
    return second.toLowerCase();
  }
  return segments.length > 1 ? first.toLowerCase() : '';
}

export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(adapters: readonly ProviderAdapter[] = BUILTIN_PROVIDERS) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /**
   * Add or replace an adapter.
   */
  register(adapter: ProviderAdapter): this {
    this.adapters.set(adapter.id, adapter);
    return this;
  }

  /** Adapter for `modelId`, or undefined when no provider matches */
  find(modelId: string): ProviderAdapter | undefined {
    return this.adapters.get(providerIdOf(modelId));
  }

  /**
   * Adapter for `modelId`.
   *
   * @throws {UnsupportedProviderError} When no adapter matches
   */
  resolve(modelId: string): ProviderAdapter {
    const adapter = this.find(modelId);
    if (!adapter) {
      throw new UnsupportedProviderError(modelId);
    }
    return adapter;
  }

  supports(modelId: string): boolean {
    return this.find(modelId) !== undefined;
  }

  /** Registered provider ids, in registration order */
  ids(): string[] {
    return [...this.adapters.keys()];
  }
}

/** Registry holding the built-in providers */
export const defaultProviderRegistry = new ProviderRegistry();

/**
 * Registry with the built-ins plus `extra` adapters.
 *
 * Hosts that need another model family pass the result to the pipeline
 * instead of mutating the default registry.
 */
export function createProviderRegistry(extra: readonly ProviderAdapter[] = []): ProviderRegistry {
  return new ProviderRegistry([...BUILTIN_PROVIDERS, ...extra]);
}
