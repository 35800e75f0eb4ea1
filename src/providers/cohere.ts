/**
 * Cohere Command R on Bedrock
 *
 * The system instruction goes in `preamble`, the query in `message`.
 */

import { z } from 'zod';

import type { ProviderAdapter } from './types.js';

const ResponseSchema = z.object({ text: z.string() });

export const cohereProvider: ProviderAdapter = {
  id: 'cohere',
  displayName: 'Cohere',

  buildRequest(_modelId, { systemInstruction, userQuery, samplingParameters }) {
    return {
      message: userQuery,
      preamble: systemInstruction,
      max_tokens: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      p: samplingParameters.topP,
    };
  },

  extractText(body) {
    const parsed = ResponseSchema.safeParse(body);
    return parsed.success ? parsed.data.text : undefined;
  },
};
