import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { LLMProviders, type LLMResponse } from '../../types.js';
import {
  DEFAULT_LLM_TIMEOUT_MS,
  OPENROUTER_HEADERS,
  PROVIDER_SPECS,
} from '../constants.js';
import { LLMCallError, errorMessage } from '../errors.js';
import type { CallLLMConfig } from './types.js';

/**
 * Call an LLM provider with a single user prompt.
 * Returns raw text output - the caller parses it.
 *
 * Failures (transport, timeout, unexpected response shape) are rethrown as
 * LLMCallError. No retries are attempted.
 */
export async function callLLM(config: CallLLMConfig): Promise<LLMResponse> {
  const {
    provider,
    apiKey,
    model,
    prompt,
    maxTokens,
    temperature,
    timeoutMs = DEFAULT_LLM_TIMEOUT_MS,
  } = config;

  try {
    // Anthropic
    if (provider === LLMProviders.anthropic) {
      const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
      const stream = client.messages.stream({
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      });
      const finalMessage = await stream.finalMessage();

      const textBlocks = finalMessage.content.flatMap((block) =>
        block.type === 'text' ? [block.text] : []
      );
      const inputTokens = finalMessage.usage.input_tokens;
      const outputTokens = finalMessage.usage.output_tokens;

      return {
        content: textBlocks.join(' '),
        model: finalMessage.model,
        usage: {
          promptTokens: inputTokens,
          completionTokens: outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
        raw: finalMessage,
      };
    }

    // OpenAI and OpenAI-compatible (OpenRouter)
    if (provider === LLMProviders.openai || provider === LLMProviders.openrouter) {
      const spec = PROVIDER_SPECS[provider];
      const client = new OpenAI({
        apiKey,
        baseURL: spec.baseURL,
        timeout: timeoutMs,
        maxRetries: 0,
        defaultHeaders: provider === LLMProviders.openrouter ? OPENROUTER_HEADERS : undefined,
      });

      const response = await client.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxTokens,
        temperature,
      });

      // OpenRouter reports upstream failures in a 200 body without choices
      if (!Array.isArray(response.choices) || response.choices.length === 0) {
        throw new Error(`Unexpected response format: ${JSON.stringify(response)}`);
      }

      const usage = response.usage;
      return {
        content: response.choices[0].message?.content ?? '',
        model: response.model ?? model,
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens ?? 0,
              completionTokens: usage.completion_tokens ?? 0,
              totalTokens: usage.total_tokens ?? 0,
            }
          : undefined,
        raw: response,
      };
    }

    throw new Error(`Unsupported provider: ${String(provider)}`);
  } catch (error) {
    throw new LLMCallError(
      `LLM call failed (${model}): ${errorMessage(error)}`,
      model,
      { cause: error }
    );
  }
}

/**
 * Return a NON-exhaustive list of commonly used model ids, free and paid.
 * Ids are OpenRouter-style (`vendor/model`).
 */
export function getAvailableModels(): string[] {
  return [
    'meta-llama/llama-3.3-70b-instruct:free',
    'google/gemma-2-9b-it:free',
    'mistralai/devstral-2512:free',
    'anthropic/claude-sonnet-4.5',
    'anthropic/claude-sonnet-4',
    'openai/gpt-4o',
    'openai/gpt-oss-120b:free',
    'openai/gpt-5-nano',
    'meta-llama/llama-3-8b-instruct',
  ];
}
