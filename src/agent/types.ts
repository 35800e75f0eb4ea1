/**
 * Agent Module Types
 *
 * Types for the generation side of the pipeline: the assembled request,
 * the raw model response and the extracted result.
 */

import { z } from 'zod';

import type { Passage, RawRetrievalResult } from '../search/types.js';
import type { RequestBody, SamplingParameters } from '../providers/types.js';

export type { SamplingParameters };

// ============================================================================
// SAMPLING
// ============================================================================

export const SamplingParametersSchema = z.object({
  temperature: z
    .number()
    .min(0, 'temperature must be between 0 and 1')
    .max(1, 'temperature must be between 0 and 1'),
  maxTokens: z.number().int('maxTokens must be an integer').min(1, 'maxTokens must be at least 1'),
  topP: z.number().min(0, 'topP must be between 0 and 1').max(1, 'topP must be between 0 and 1'),
});

// ============================================================================
// REQUEST / RESPONSE
// ============================================================================

/**
 * A fully assembled generation request. Frozen by the assembler.
 */
export interface GenerationRequest {
  readonly modelId: string;
  readonly providerId: string;
  /** Template, labeled passages and the answering instruction */
  readonly systemInstruction: string;
  /** Passages that survived truncation, in label order */
  readonly contextPassages: readonly Passage[];
  readonly userQuery: string;
  readonly samplingParameters: Readonly<SamplingParameters>;
  /** ceil(chars / 4) over systemInstruction + userQuery */
  readonly estimatedTokens: number;
}

/**
 * Decoded InvokeModel response.
 */
export interface RawGenerationResponse {
  modelId: string;
  /** JSON-decoded response body */
  body: unknown;
  latencyMs: number;
}

export interface GenerationResult {
  /** Non-empty answer text */
  answerText: string;
  /** Passages whose `[n]` label appears in the answer, in label order */
  citedPassages: Passage[];
  rawLatencyMs: number;
}

// ============================================================================
// PIPELINE
// ============================================================================

/** Milliseconds spent in each step; absent for steps that did not run */
export interface StepTimings {
  guard?: number;
  retrieve?: number;
  normalize?: number;
  assemble?: number;
  generate?: number;
  extract?: number;
  total: number;
}

/**
 * Every intermediate value produced while answering one query.
 */
export interface PipelineTrace {
  rawResults: RawRetrievalResult[];
  passages: Passage[];
  request?: GenerationRequest;
  requestBody?: RequestBody;
  rawResponse?: RawGenerationResponse;
  /** Prompt guard verdict, when the guard ran */
  guard?: PromptClassification;
  /** Attempts per network step (1 when no retry happened) */
  attempts: { retrieve: number; generate: number };
  timings: StepTimings;
}

export interface PipelineResult {
  result: GenerationResult;
  trace: PipelineTrace;
  /** True when the prompt guard refused the query */
  refused: boolean;
}

// ============================================================================
// PROMPT GUARD
// ============================================================================

export type PromptCategory = 'A' | 'B' | 'C' | 'D' | 'E';

export interface PromptClassification {
  /** Parsed category, or null when the model's reply had none */
  category: PromptCategory | null;
  /** The model's reply, untouched */
  raw: string;
}
