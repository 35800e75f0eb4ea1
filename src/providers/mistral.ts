/**
 * Mistral on Bedrock
 */

import { z } from 'zod';

import type { ProviderAdapter } from './types.js';

const CompletionResponseSchema = z.object({
  outputs: z.tuple([z.object({ text: z.string() })]).rest(z.unknown()),
});

/** Mistral Large 2 answers in chat-completion form */
const ChatResponseSchema = z.object({
  choices: z
    .tuple([z.object({ message: z.object({ content: z.string() }) })])
    .rest(z.unknown()),
});

export const mistralProvider: ProviderAdapter = {
  id: 'mistral',
  displayName: 'Mistral AI',

  buildRequest(_modelId, { systemInstruction, userQuery, samplingParameters }) {
    return {
      prompt: `<s>[INST] ${systemInstruction}\n\n${userQuery} [/INST]`,
      max_tokens: samplingParameters.maxTokens,
      temperature: samplingParameters.temperature,
      top_p: samplingParameters.topP,
    };
  },

  extractText(body) {
    const completion = CompletionResponseSchema.safeParse(body);
    if (completion.success) return completion.data.outputs[0].text;

    const chat = ChatResponseSchema.safeParse(body);
    return chat.success ? chat.data.choices[0].message.content : undefined;
  },
};
