/**
 * Amazon models on Bedrock
 *
 * Two request shapes share the `amazon` vendor segment:
 * - Titan Text: a single `inputText` prompt plus `textGenerationConfig`
 * - Nova: `messages-v1` schema with `system`, `messages` and `inferenceConfig`
 */

import { z } from 'zod';

import type { ProviderAdapter, ProviderPrompt, RequestBody } from './types.js';

const TitanResponseSchema = z.object({
  results: z.tuple([z.object({ outputText: z.string() })]).rest(z.unknown()),
});

const NovaResponseSchema = z.object({
  output: z.object({
    message: z.object({
      content: z.array(z.object({ text: z.string().optional() })),
    }),
  }),
});

/**
 * Nova model ids look like "amazon.nova-lite-v1:0", optionally behind an
 * inference-profile prefix ("us.") or a foundation-model ARN ("…/").
 */
export function isNovaModel(modelId: string): boolean {
  return /(^|[./])amazon\.nova-/.test(modelId.trim());
}

function titanRequest({ systemInstruction, userQuery, samplingParameters }: ProviderPrompt): RequestBody {
  return {
    inputText: `${systemInstruction}\n\nUser: ${userQuery}\nBot:`,
    textGenerationConfig: {
      maxTokenCount: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      topP: samplingParameters.topP,
    },
  };
}

function novaRequest({ systemInstruction, userQuery, samplingParameters }: ProviderPrompt): RequestBody {
  return {
    schemaVersion: 'messages-v1',
    system: [{ text: systemInstruction }],
    messages: [{ role: 'user', content: [{ text: userQuery }] }],
    inferenceConfig: {
      max_new_tokens: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      top_p: samplingParameters.topP,
    },
  };
}

export const amazonProvider: ProviderAdapter = {
  id: 'amazon',
  displayName: 'Amazon',

  buildRequest(modelId, prompt) {
    return isNovaModel(modelId) ? novaRequest(prompt) : titanRequest(prompt);
  },

  extractText(body) {
    const titan = TitanResponseSchema.safeParse(body);
    if (titan.success) return titan.data.results[0].outputText;

    const nova = NovaResponseSchema.safeParse(body);
    if (nova.success) {
      return nova.data.output.message.content.map((block) => block.text ?? '').join('');
    }
    return undefined;
  },
};
