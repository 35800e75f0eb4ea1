/**
 * KnowledgeBaseRetriever Tests
 *
 * The SDK client is replaced by an object with a mocked `send`.
 */

import { describe, it, expect, vi } from 'vitest';
import { RetrieveCommand } from '@aws-sdk/client-bedrock-agent-runtime';

import { KnowledgeBaseRetriever, extractResultList } from '../retriever.js';
import { createConnectionContext } from '../../config/context.js';
import { RetrievalError, ValidationError, classify } from '../../errors/index.js';

const context = createConnectionContext({
  knowledgeBaseId: 'KB123',
  modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
  region: 'us-west-2',
});

function createRetriever(send = vi.fn()) {
  return { retriever: new KnowledgeBaseRetriever({ send }), send };
}

describe('extractResultList', () => {
  it('reads retrievalResults', () => {
    expect(extractResultList({ retrievalResults: [{ text: 'a' }] })).toEqual([{ text: 'a' }]);
  });

  it('falls through empty lists to the next key', () => {
    expect(extractResultList({ retrievalResults: [], hits: [{ text: 'b' }] })).toEqual([
      { text: 'b' },
    ]);
  });

  it('unwraps a nested envelope', () => {
    expect(extractResultList({ results: { items: [{ text: 'c' }] } })).toEqual([{ text: 'c' }]);
  });

  it('drops non-object entries', () => {
    expect(extractResultList({ items: [{ text: 'd' }, 'junk', null, [1]] })).toEqual([
      { text: 'd' },
    ]);
  });

  it('returns an empty list for unknown shapes', () => {
    expect(extractResultList({ documents: [{ text: 'e' }] })).toEqual([]);
    expect(extractResultList(null)).toEqual([]);
  });
});

describe('KnowledgeBaseRetriever', () => {
  it('issues one Retrieve call with the query and topK', async () => {
    const { retriever, send } = createRetriever(
      vi.fn().mockResolvedValue({ retrievalResults: [{ content: { text: 'x' }, score: 0.5 }] })
    );

    const results = await retriever.retrieve(context, '  refund policy ', 4);

    expect(results).toEqual([{ content: { text: 'x' }, score: 0.5 }]);
    expect(send).toHaveBeenCalledTimes(1);
    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(RetrieveCommand);
    expect(command.input).toEqual({
      knowledgeBaseId: 'KB123',
      retrievalQuery: { text: 'refund policy' },
      retrievalConfiguration: { vectorSearchConfiguration: { numberOfResults: 4 } },
    });
  });

  it('rejects a blank query before calling the service', async () => {
    const { retriever, send } = createRetriever();

    await expect(retriever.retrieve(context, '   ', 3)).rejects.toBeInstanceOf(ValidationError);
    expect(send).not.toHaveBeenCalled();
  });

  it.each([0, -1, 2.5])('rejects topK %s', async (topK) => {
    const { retriever, send } = createRetriever();

    await expect(retriever.retrieve(context, 'q', topK)).rejects.toBeInstanceOf(ValidationError);
    expect(send).not.toHaveBeenCalled();
  });

  it('wraps service errors in RetrievalError with the cause kept', async () => {
    const denied = Object.assign(new Error('not authorized'), { name: 'AccessDeniedException' });
    const { retriever } = createRetriever(vi.fn().mockRejectedValue(denied));

    const error = await retriever.retrieve(context, 'q', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error instanceof RetrievalError && error.cause).toBe(denied);
    expect(classify(error, 'retrieval').category).toBe('Permission');
  });

  it('turns a timeout into a transient RetrievalError', async () => {
    vi.useFakeTimers();
    try {
      const send = vi.fn(
        (_command: unknown, options?: { abortSignal?: AbortSignal }) =>
          new Promise((_resolve, reject) => {
            options?.abortSignal?.addEventListener('abort', () =>
              reject(Object.assign(new Error('aborted'), { name: 'AbortError' }))
            );
          })
      );
      const { retriever } = createRetriever(send);

      const pending = retriever.retrieve(context, 'q', 3, { timeoutMs: 50 }).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(50);
      const error = await pending;

      expect(error).toBeInstanceOf(RetrievalError);
      const classified = classify(error, 'retrieval');
      expect(classified.category).toBe('Transient');
      expect(classified.retryable).toBe(true);
      expect(classified.originalMessage).toBe('Request timed out after 50ms');
    } finally {
      vi.useRealTimers();
    }
  });
});
