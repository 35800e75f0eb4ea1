/**
 * Agent Module
 *
 * Generation-side orchestration: prompt assembly, model invocation,
 * response extraction, retries, the prompt guard and the end-to-end
 * pipeline.
 */

export {
  assemble,
  buildRequestBody,
  buildSystemInstruction,
  formatPassageBlock,
  estimateTokens,
  AssemblerOptionsSchema,
  DEFAULT_SYSTEM_TEMPLATE,
  DEFAULT_TOKEN_BUDGET,
  ANSWER_INSTRUCTION,
  NO_CONTEXT_NOTICE,
  type AssemblerOptions,
} from './assembler.js';

export { ModelGenerator, createGenerator, decodeBody, type GeneratorOptions } from './generator.js';

export { extract } from './extractor.js';

export {
  citedLabels,
  labeledCitations,
  resolveCitations,
  labelPassages,
  formatCitations,
  type LabeledPassage,
  type CitationFormatOptions,
} from './citations.js';

export {
  withRetry,
  backoffDelay,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  type RetryInfo,
} from './retry.js';

export {
  classifyPrompt,
  isAnswerable,
  parseCategory,
  GUARD_INSTRUCTION,
  GUARD_SAMPLING,
  REFUSAL_ANSWER,
  type PromptGuardDeps,
} from './prompt-guard.js';

export {
  createRAGPipeline,
  createRAGPipelineFromConfig,
  DEFAULT_SAMPLING,
  DEFAULT_TOP_K,
  type RAGPipeline,
  type RAGPipelineDeps,
  type PipelineRetryOptions,
  type AskOptions,
} from './pipeline.js';

export {
  SamplingParametersSchema,
  type SamplingParameters,
  type GenerationRequest,
  type RawGenerationResponse,
  type GenerationResult,
  type StepTimings,
  type PipelineTrace,
  type PipelineResult,
  type PromptCategory,
  type PromptClassification,
} from './types.js';
