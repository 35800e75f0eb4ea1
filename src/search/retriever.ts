/**
 * Knowledge Base Retriever
 *
 * Issues one `Retrieve` call per query and hands back the raw result
 * list. The response envelope differs between knowledge-base
 * configurations, so the list is located by key rather than assumed.
 *
 * No retry and no caching happen here: a failed call surfaces as a
 * `RetrievalError` carrying the SDK's error as its cause.
 *
 * @example
 * ```typescript
 * const retriever = createRetriever(context.region);
 * const raw = await retriever.retrieve(context, 'What is the refund policy?', 5);
 * const passages = normalize(raw);
 * ```
 */

import { RetrieveCommand } from '@aws-sdk/client-bedrock-agent-runtime';
import { z } from 'zod';

import type { ConnectionContext } from '../config/context.js';
import { RetrievalError, ValidationError } from '../errors/index.js';
import { getAgentRuntimeClient, type RetrieveSender } from '../providers/clients.js';
import { withDeadline, type RequestOptions } from '../utils/deadline.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { RawRetrievalResult } from './types.js';

/** Keys that may hold the result list, in priority order */
const ENVELOPE_KEYS = ['retrievalResults', 'results', 'items', 'hits'] as const;

const RetrieveInputSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  topK: z.number().int('topK must be an integer').positive('topK must be positive'),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listUnder(envelope: Record<string, unknown>): unknown[] | undefined {
  for (const key of ENVELOPE_KEYS) {
    const value = envelope[key];
    if (Array.isArray(value) && value.length > 0) return value;
  }
  return undefined;
}

/**
 * Locate the result list inside a retrieve response.
 *
 * The first envelope key holding a non-empty list wins. A key holding an
 * object is unwrapped once (`{ results: { items: [...] } }`). Entries that
 * are not objects are dropped.
 */
export function extractResultList(response: unknown): RawRetrievalResult[] {
  if (!isRecord(response)) return [];

  let list = listUnder(response);
  if (!list) {
    for (const key of ENVELOPE_KEYS) {
      const nested = response[key];
      if (isRecord(nested)) {
        list = listUnder(nested);
        if (list) break;
      }
    }
  }

  return (list ?? []).filter(isRecord);
}

/**
 * Thin wrapper over the knowledge-base retrieve API.
 */
export class KnowledgeBaseRetriever {
  private readonly client: RetrieveSender;
  private readonly logger: Logger;

  constructor(client: RetrieveSender, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Retrieve up to `topK` raw results for `query`.
   *
   * @throws {ValidationError} When the query is blank or topK is not a positive integer
   * @throws {RetrievalError} When the service call fails or times out
   */
  async retrieve(
    context: ConnectionContext,
    query: string,
    topK: number,
    options: RequestOptions = {}
  ): Promise<RawRetrievalResult[]> {
    const response = await this.retrieveRaw(context, query, topK, options);
    const results = extractResultList(response);
    this.logger.debug?.(`Retrieved ${results.length} result(s) from ${context.knowledgeBaseId}`);
    return results;
  }

  /**
   * Same call as `retrieve`, returning the response untouched.
   *
   * Used by diagnostics to show what the service actually sent.
   */
  async retrieveRaw(
    context: ConnectionContext,
    query: string,
    topK: number,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const parsed = RetrieveInputSchema.safeParse({ query, topK });
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid retrieval request',
        parsed.error.issues.map((issue) => issue.message)
      );
    }

    const command = new RetrieveCommand({
      knowledgeBaseId: context.knowledgeBaseId,
      retrievalQuery: { text: parsed.data.query },
      retrievalConfiguration: {
        vectorSearchConfiguration: { numberOfResults: parsed.data.topK },
      },
    });

    try {
      return await withDeadline(options, (abortSignal) =>
        this.client.send(command, { abortSignal })
      );
    } catch (error) {
      throw new RetrievalError(error);
    }
  }
}

/**
 * Create a retriever backed by the shared SDK client for `region`.
 */
export function createRetriever(region: string, logger?: Logger): KnowledgeBaseRetriever {
  return new KnowledgeBaseRetriever(getAgentRuntimeClient(region), logger);
}
