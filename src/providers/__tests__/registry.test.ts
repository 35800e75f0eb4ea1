/**
 * Provider Registry Tests
 *
 * Tests cover:
 * - Provider id extraction (inference profiles, ARNs)
 * - Request bodies per built-in provider
 * - Response extraction per built-in provider
 * - Registration of extra adapters
 */

import { describe, it, expect } from 'vitest';

import {
  ProviderRegistry,
  createProviderRegistry,
  defaultProviderRegistry,
  providerIdOf,
} from '../registry.js';
import { UnsupportedProviderError } from '../../errors/index.js';
import type { ProviderAdapter, ProviderPrompt } from '../types.js';

const prompt: ProviderPrompt = {
  systemInstruction: 'Answer from context.',
  userQuery: 'What colour is the sky?',
  samplingParameters: { temperature: 0.2, maxTokens: 256, topP: 0.9 },
};

describe('providerIdOf', () => {
  it.each([
    ['anthropic.claude-3-haiku-20240307-v1:0', 'anthropic'],
    ['us.anthropic.claude-3-5-sonnet-20241022-v2:0', 'anthropic'],
    ['eu.meta.llama3-2-3b-instruct-v1:0', 'meta'],
    ['global.amazon.nova-pro-v1:0', 'amazon'],
    ['arn:aws:bedrock:us-west-2::foundation-model/mistral.mistral-large-2402-v1:0', 'mistral'],
    ['Cohere.command-r-v1:0', 'cohere'],
    ['no-dots', ''],
    ['', ''],
  ])('%s → %s', (modelId, expected) => {
    expect(providerIdOf(modelId)).toBe(expected);
  });
});

describe('ProviderRegistry', () => {
  it('resolves built-in providers', () => {
    expect(defaultProviderRegistry.ids()).toEqual(['anthropic', 'amazon', 'meta', 'mistral', 'cohere']);
    expect(defaultProviderRegistry.resolve('meta.llama3-8b-instruct-v1:0').id).toBe('meta');
  });

  it('throws UnsupportedProviderError for unknown vendors', () => {
    expect(() => defaultProviderRegistry.resolve('ai21.j2-ultra-v1')).toThrow(UnsupportedProviderError);
    expect(() => defaultProviderRegistry.resolve('ai21.j2-ultra-v1')).toThrow(
      'Unsupported model provider for model id "ai21.j2-ultra-v1"'
    );
    expect(defaultProviderRegistry.supports('ai21.j2-ultra-v1')).toBe(false);
  });

  it('accepts extra adapters without touching the default registry', () => {
    const ai21: ProviderAdapter = {
      id: 'ai21',
      displayName: 'AI21 Labs',
      buildRequest: (_modelId, p) => ({ prompt: p.userQuery }),
      extractText: () => 'ok',
    };

    const registry = createProviderRegistry([ai21]);

    expect(registry.resolve('ai21.jamba-instruct-v1:0')).toBe(ai21);
    expect(defaultProviderRegistry.supports('ai21.jamba-instruct-v1:0')).toBe(false);
  });

  it('register replaces an existing adapter', () => {
    const registry = new ProviderRegistry([]);
    const first: ProviderAdapter = {
      id: 'x',
      displayName: 'X',
      buildRequest: () => ({ v: 1 }),
      extractText: () => undefined,
    };
    const second: ProviderAdapter = { ...first, buildRequest: () => ({ v: 2 }) };

    registry.register(first).register(second);

    expect(registry.resolve('x.model').buildRequest('x.model', prompt)).toEqual({ v: 2 });
  });
});

describe('request bodies', () => {
  const build = (modelId: string) => defaultProviderRegistry.resolve(modelId).buildRequest(modelId, prompt);

  it('anthropic uses the messages API', () => {
    expect(build('anthropic.claude-3-haiku-20240307-v1:0')).toEqual({
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: 256,
      temperature: 0.2,
      top_p: 0.9,
      system: 'Answer from context.',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'What colour is the sky?' }] }],
    });
  });

  it('amazon titan uses inputText', () => {
    expect(build('amazon.titan-text-express-v1')).toEqual({
      inputText: 'Answer from context.\n\nUser: What colour is the sky?\nBot:',
      textGenerationConfig: { maxTokenCount: 256, temperature: 0.2, topP: 0.9 },
    });
  });

  it('amazon nova uses messages-v1', () => {
    expect(build('us.amazon.nova-lite-v1:0')).toEqual({
      schemaVersion: 'messages-v1',
      system: [{ text: 'Answer from context.' }],
      messages: [{ role: 'user', content: [{ text: 'What colour is the sky?' }] }],
      inferenceConfig: { max_new_tokens: 256, temperature: 0.2, top_p: 0.9 },
    });
  });

  it('amazon nova addressed by foundation-model ARN uses messages-v1', () => {
    expect(build('arn:aws:bedrock:us-east-1::foundation-model/amazon.nova-lite-v1:0')).toMatchObject({
      schemaVersion: 'messages-v1',
      inferenceConfig: { max_new_tokens: 256, temperature: 0.2, top_p: 0.9 },
    });
  });

  it('amazon titan addressed by ARN keeps inputText', () => {
    expect(build('arn:aws:bedrock:us-east-1::foundation-model/amazon.titan-text-express-v1')).toHaveProperty(
      'inputText'
    );
  });

  it('meta renders the Llama 3 template', () => {
    expect(build('meta.llama3-8b-instruct-v1:0')).toEqual({
      prompt:
        '<|begin_of_text|><|start_header_id|>system<|end_header_id|>\n\nAnswer from context.<|eot_id|>' +
        '<|start_header_id|>user<|end_header_id|>\n\nWhat colour is the sky?<|eot_id|>' +
        '<|start_header_id|>assistant<|end_header_id|>\n\n',
      max_gen_len: 256,
      temperature: 0.2,
      top_p: 0.9,
    });
  });

  it('mistral wraps the prompt in [INST]', () => {
    expect(build('mistral.mistral-7b-instruct-v0:2')).toEqual({
      prompt: '<s>[INST] Answer from context.\n\nWhat colour is the sky? [/INST]',
      max_tokens: 256,
      temperature: 0.2,
      top_p: 0.9,
    });
  });

  it('cohere uses message and preamble', () => {
    expect(build('cohere.command-r-v1:0')).toEqual({
      message: 'What colour is the sky?',
      preamble: 'Answer from context.',
      max_tokens: 256,
      temperature: 0.2,
      p: 0.9,
    });
  });
});

describe('response extraction', () => {
  const extract = (modelId: string, body: unknown) =>
    defaultProviderRegistry.resolve(modelId).extractText(body);

  it('anthropic joins text blocks', () => {
    expect(
      extract('anthropic.claude-3-haiku-20240307-v1:0', {
        content: [
          { type: 'text', text: 'Blue ' },
          { type: 'tool_use', id: 't1' },
          { type: 'text', text: '[1].' },
        ],
      })
    ).toBe('Blue [1].');
  });

  it('amazon reads titan and nova envelopes', () => {
    expect(extract('amazon.titan-text-express-v1', { results: [{ outputText: 'Blue.' }] })).toBe('Blue.');
    expect(
      extract('amazon.nova-lite-v1:0', { output: { message: { content: [{ text: 'Blue.' }] } } })
    ).toBe('Blue.');
  });

  it('meta reads generation', () => {
    expect(extract('meta.llama3-8b-instruct-v1:0', { generation: 'Blue.' })).toBe('Blue.');
  });

  it('mistral reads outputs or choices', () => {
    expect(extract('mistral.mistral-7b-instruct-v0:2', { outputs: [{ text: 'Blue.' }] })).toBe('Blue.');
    expect(
      extract('mistral.mistral-large-2407-v1:0', { choices: [{ message: { content: 'Blue.' } }] })
    ).toBe('Blue.');
  });

  it('cohere reads text', () => {
    expect(extract('cohere.command-r-v1:0', { text: 'Blue.' })).toBe('Blue.');
  });

  it('returns undefined for a foreign envelope', () => {
    expect(extract('anthropic.claude-3-haiku-20240307-v1:0', { generation: 'Blue.' })).toBeUndefined();
    expect(extract('meta.llama3-8b-instruct-v1:0', { results: [] })).toBeUndefined();
    expect(extract('amazon.titan-text-express-v1', { results: [] })).toBeUndefined();
  });
});
