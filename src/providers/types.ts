/**
 * Provider Types
 *
 * A provider adapter knows one model family's request body and response
 * envelope. Adding a model family means adding an adapter, not branching
 * inside the assembler or the extractor.
 */

/**
 * Sampling parameters shared by every provider.
 */
export interface SamplingParameters {
  /** 0-1 */
  temperature: number;
  /** At least 1 */
  maxTokens: number;
  /** 0-1 */
  topP: number;
}

/**
 * Provider-neutral prompt handed to `buildRequest`.
 */
export interface ProviderPrompt {
  systemInstruction: string;
  userQuery: string;
  samplingParameters: SamplingParameters;
}

/** JSON body sent to InvokeModel */
export type RequestBody = Record<string, unknown>;

export interface ProviderAdapter {
  /** Vendor segment of the model id (e.g. "anthropic") */
  readonly id: string;
  /** Display name used by `kbrag models` */
  readonly displayName: string;
  /** Build the InvokeModel body for `modelId` */
  buildRequest(modelId: string, prompt: ProviderPrompt): RequestBody;
  /**
   * Read the answer text from a decoded response body.
   *
   * Returns undefined when the body does not have the expected shape.
   */
  extractText(body: unknown): string | undefined;
}
