/**
 * Raw Retrieval Dump
 */

import type { ConnectionContext } from '../config/context.js';
import type { RequestOptions } from '../utils/deadline.js';
import { createRetriever, type KnowledgeBaseRetriever } from '../search/retriever.js';

export interface DumpRetrievalOptions extends RequestOptions {
  retriever?: Pick<KnowledgeBaseRetriever, 'retrieveRaw'>;
}

/**
 * The retrieve response exactly as the service returned it, without
 * normalization. Errors surface as RetrievalError.
 */
export async function dumpRetrieval(
  context: ConnectionContext,
  query: string,
  topK = 5,
  options: DumpRetrievalOptions = {}
): Promise<unknown> {
  const { retriever = createRetriever(context.region), ...requestOptions } = options;
  return retriever.retrieveRaw(context, query, topK, requestOptions);
}
