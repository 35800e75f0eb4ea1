/**
 * Anthropic Claude on Bedrock
 *
 * Messages API: the system instruction travels in `system`, the user
 * query as the single user message. The response holds a list of
 * content blocks; text blocks are concatenated.
 */

import { z } from 'zod';

import type { ProviderAdapter } from './types.js';

/** Required by Bedrock for every Claude request */
export const ANTHROPIC_BEDROCK_VERSION = 'bedrock-2023-05-31';

const ResponseSchema = z.object({
  content: z.array(
    z.union([z.object({ type: z.literal('text'), text: z.string() }), z.object({ type: z.string() })])
  ),
});

export const anthropicProvider: ProviderAdapter = {
  id: 'anthropic',
  displayName: 'Anthropic',

  buildRequest(_modelId, { systemInstruction, userQuery, samplingParameters }) {
    return {
      anthropic_version: ANTHROPIC_BEDROCK_VERSION,
      max_tokens: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      top_p: samplingParameters.topP,
      system: systemInstruction,
      messages: [{ role: 'user', content: [{ type: 'text', text: userQuery }] }],
    };
  },

  extractText(body) {
    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) return undefined;
    return parsed.data.content.map((block) => ('text' in block ? block.text : '')).join('');
  },
};
