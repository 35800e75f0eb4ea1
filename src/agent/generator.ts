/**
 * Generation Client
 *
 * One InvokeModel call per request. The body comes from the provider
 * registry; the response body is decoded from JSON and returned as is.
 */

import { InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';

import type { ConnectionContext } from '../config/context.js';
import { GenerationError, MalformedResponseError } from '../errors/index.js';
import { getRuntimeClient, type InvokeModelSender } from '../providers/clients.js';
import { defaultProviderRegistry, type ProviderRegistry } from '../providers/registry.js';
import type { RequestBody } from '../providers/types.js';
import { withDeadline, type RequestOptions } from '../utils/deadline.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildRequestBody } from './assembler.js';
import type { GenerationRequest, RawGenerationResponse } from './types.js';

export interface GeneratorOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
}

export class ModelGenerator {
  private readonly client: InvokeModelSender;
  private readonly registry: ProviderRegistry;
  private readonly logger: Logger;

  constructor(client: InvokeModelSender, options: GeneratorOptions = {}) {
    this.client = client;
    this.registry = options.registry ?? defaultProviderRegistry;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Invoke the request's model.
   *
   * @throws {UnsupportedProviderError} When the provider is unknown (no call is made)
   * @throws {GenerationError} When the call fails or times out
   * @throws {MalformedResponseError} When the body is not JSON
   */
  async generate(
    context: ConnectionContext,
    request: GenerationRequest,
    options: RequestOptions = {}
  ): Promise<RawGenerationResponse> {
    const body = buildRequestBody(request, this.registry);
    this.logger.debug?.(`Invoking ${request.modelId} in ${context.region}`);
    return this.invoke(request.modelId, body, options);
  }

  /**
   * Invoke `modelId` with a prebuilt body.
   */
  async invoke(
    modelId: string,
    body: RequestBody,
    options: RequestOptions = {}
  ): Promise<RawGenerationResponse> {
    const command = new InvokeModelCommand({
      modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: new TextEncoder().encode(JSON.stringify(body)),
    });

    const startTime = performance.now();
    let payload: Uint8Array | undefined;
    try {
      const response = await withDeadline(options, (abortSignal) =>
        this.client.send(command, { abortSignal })
      );
      payload = response.body;
    } catch (error) {
      throw new GenerationError(error);
    }
    const latencyMs = Math.round(performance.now() - startTime);

    this.logger.debug?.(`InvokeModel ${modelId} answered in ${latencyMs}ms`);

    return { modelId, body: decodeBody(modelId, payload), latencyMs };
  }
}

/**
 * Decode a JSON response payload.
 *
 * @throws {MalformedResponseError} When the payload is missing or not JSON
 */
export function decodeBody(modelId: string, payload: Uint8Array | undefined): unknown {
  if (!payload || payload.length === 0) {
    throw new MalformedResponseError(modelId, 'empty response body');
  }
  const text = new TextDecoder().decode(payload);
  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedResponseError(modelId, 'response body is not JSON');
  }
}

export function createGenerator(region: string, options?: GeneratorOptions): ModelGenerator {
  return new ModelGenerator(getRuntimeClient(region), options);
}
