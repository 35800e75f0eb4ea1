/**
 * Meta Llama on Bedrock
 *
 * Prompt-string provider: the system instruction and query are rendered
 * into the Llama 3 chat template.
 */

import { z } from 'zod';

import type { ProviderAdapter } from './types.js';

const ResponseSchema = z.object({ generation: z.string() });

export function llama3Prompt(systemInstruction: string, userQuery: string): string {
  return (
    '<|begin_of_text|>' +
    `<|start_header_id|>system<|end_header_id|>\n\n${systemInstruction}<|eot_id|>` +
    `<|start_header_id|>user<|end_header_id|>\n\n${userQuery}<|eot_id|>` +
    '<|start_header_id|>assistant<|end_header_id|>\n\n'
  );
}

export const metaProvider: ProviderAdapter = {
  id: 'meta',
  displayName: 'Meta',

  buildRequest(_modelId, { systemInstruction, userQuery, samplingParameters }) {
    return {
      prompt: llama3Prompt(systemInstruction, userQuery),
      max_gen_len: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      top_p: samplingParameters.topP,
    };
  },

  extractText(body) {
    const parsed = ResponseSchema.safeParse(body);
    return parsed.success ? parsed.data.generation : undefined;
  },
};
