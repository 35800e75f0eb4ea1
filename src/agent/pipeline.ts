/**
 * RAG Pipeline
 *
 * Answers one query end to end and keeps every intermediate value.
 *
 * ARCHITECTURE:
 * ```
 * query
 *   │
 *   ├── [optional] prompt guard ── not E ──► refusal (no retrieval)
 *   │
 *   ├── retrieve   (KnowledgeBaseRetriever, retried)
 *   ├── normalize  (alias tables, dedup, ordering)
 *   ├── assemble   (labels, token budget, provider body)
 *   ├── generate   (ModelGenerator, retried)
 *   └── extract    (provider envelope, citations)
 *   │
 *   ▼
 * { result, trace, refused }
 * ```
 *
 * Components are injected so tests can replace the network-facing ones.
 *
 * @example
 * ```typescript
 * const pipeline = createRAGPipelineFromConfig(config, context);
 * const { result, trace } = await pipeline.ask('What is the refund window?');
 * console.log(result.answerText);
 * console.log(trace.timings);
 * ```
 */

import type { Config } from '../config/schema.js';
import type { ConnectionContext } from '../config/context.js';
import { defaultProviderRegistry, type ProviderRegistry } from '../providers/registry.js';
import { createRetriever, type KnowledgeBaseRetriever } from '../search/retriever.js';
import { normalize } from '../search/normalizer.js';
import type { RequestOptions } from '../utils/deadline.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { assemble, buildRequestBody } from './assembler.js';
import { extract } from './extractor.js';
import { createGenerator, type ModelGenerator } from './generator.js';
import { classifyPrompt, isAnswerable, REFUSAL_ANSWER } from './prompt-guard.js';
import { withRetry } from './retry.js';
import type { PipelineResult, PipelineTrace, SamplingParameters, StepTimings } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineRetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface RAGPipelineDeps {
  context: ConnectionContext;
  retriever: Pick<KnowledgeBaseRetriever, 'retrieve'>;
  generator: Pick<ModelGenerator, 'generate' | 'invoke'>;
  registry?: ProviderRegistry;
  logger?: Logger;
  /** Passages to retrieve (default: 3) */
  topK?: number;
  samplingParameters?: SamplingParameters;
  tokenBudget?: number;
  systemTemplate?: string;
  retry?: PipelineRetryOptions;
  /** Per-call timeout for every network step */
  timeoutMs?: number;
  guard?: { enabled: boolean; modelId?: string };
}

export interface AskOptions {
  topK?: number;
  signal?: AbortSignal;
}

export interface RAGPipeline {
  ask(query: string, options?: AskOptions): Promise<PipelineResult>;
}

export const DEFAULT_SAMPLING: Readonly<SamplingParameters> = Object.freeze({
  temperature: 0,
  maxTokens: 512,
  topP: 1,
});

export const DEFAULT_TOP_K = 3;

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Time `fn` into `timings[step]`.
 */
async function timed<T>(
  timings: StepTimings,
  step: Exclude<keyof StepTimings, 'total'>,
  fn: () => Promise<T> | T
): Promise<T> {
  const start = performance.now();
  try {
    return await fn();
  } finally {
    timings[step] = Math.round(performance.now() - start);
  }
}

export function createRAGPipeline(deps: RAGPipelineDeps): RAGPipeline {
  const registry = deps.registry ?? defaultProviderRegistry;
  const logger = deps.logger ?? silentLogger;
  const sampling = deps.samplingParameters ?? DEFAULT_SAMPLING;
  const { context } = deps;

  return {
    async ask(query: string, options: AskOptions = {}): Promise<PipelineResult> {
      const startTime = performance.now();
      const timings: StepTimings = { total: 0 };
      const trace: PipelineTrace = {
        rawResults: [],
        passages: [],
        attempts: { retrieve: 0, generate: 0 },
        timings,
      };
      const requestOptions: RequestOptions = { timeoutMs: deps.timeoutMs, signal: options.signal };
      const retryBase = { ...deps.retry, signal: options.signal };
      const finish = () => {
        timings.total = Math.round(performance.now() - startTime);
      };

      if (deps.guard?.enabled) {
        const verdict = await timed(timings, 'guard', () =>
          classifyPrompt(context, query, {
            generator: deps.generator,
            registry,
            modelId: deps.guard?.modelId,
            requestOptions,
          })
        );
        trace.guard = verdict;
        logger.debug?.(`Prompt guard: category ${verdict.category ?? 'none'}`);

        if (!isAnswerable(verdict)) {
          finish();
          return {
            result: { answerText: REFUSAL_ANSWER, citedPassages: [], rawLatencyMs: 0 },
            trace,
            refused: true,
          };
        }
      }

      trace.rawResults = await timed(timings, 'retrieve', () =>
        withRetry(
          (attempt) => {
            trace.attempts.retrieve = attempt;
            const topK = options.topK ?? deps.topK ?? DEFAULT_TOP_K;
            return deps.retriever.retrieve(context, query, topK, requestOptions);
          },
          {
            ...retryBase,
            sourceComponent: 'retrieval',
            onRetry: ({ attempt, delayMs, classified }) =>
              logger.warn(
                `Retrieval attempt ${attempt} failed (${classified.category}); retrying in ${delayMs}ms`
              ),
          }
        )
      );

      trace.passages = await timed(timings, 'normalize', () => normalize(trace.rawResults));
      logger.debug?.(`${trace.rawResults.length} raw result(s) → ${trace.passages.length} passage(s)`);

      const request = await timed(timings, 'assemble', () =>
        assemble(context, query, trace.passages, sampling, {
          registry,
          tokenBudget: deps.tokenBudget,
          systemTemplate: deps.systemTemplate,
        })
      );
      trace.request = request;
      trace.requestBody = buildRequestBody(request, registry);

      if (request.contextPassages.length < trace.passages.length) {
        logger.debug?.(
          `Dropped ${trace.passages.length - request.contextPassages.length} passage(s) to fit the token budget`
        );
      }

      const rawResponse = await timed(timings, 'generate', () =>
        withRetry(
          (attempt) => {
            trace.attempts.generate = attempt;
            return deps.generator.generate(context, request, requestOptions);
          },
          {
            ...retryBase,
            sourceComponent: 'generation',
            onRetry: ({ attempt, delayMs, classified }) =>
              logger.warn(
                `Generation attempt ${attempt} failed (${classified.category}); retrying in ${delayMs}ms`
              ),
          }
        )
      );
      trace.rawResponse = rawResponse;

      const result = await timed(timings, 'extract', () =>
        extract(rawResponse, request.modelId, request.contextPassages, registry)
      );

      finish();
      return { result, trace, refused: false };
    },
  };
}

/**
 * Build a pipeline from the resolved config, using the shared SDK clients
 * for the context's region.
 */
export function createRAGPipelineFromConfig(
  config: Config,
  context: ConnectionContext,
  logger: Logger = silentLogger
): RAGPipeline {
  return createRAGPipeline({
    context,
    retriever: createRetriever(context.region, logger),
    generator: createGenerator(context.region, { logger }),
    logger,
    topK: config.retrieval.top_k,
    samplingParameters: {
      temperature: config.generation.temperature,
      maxTokens: config.generation.max_tokens,
      topP: config.generation.top_p,
    },
    tokenBudget: config.generation.context_token_budget,
    timeoutMs: config.request.timeout_ms,
    retry: {
      maxAttempts: config.request.max_attempts,
      baseDelayMs: config.request.base_delay_ms,
    },
    guard: { enabled: config.guard.enabled, modelId: config.guard.model_id },
  });
}
