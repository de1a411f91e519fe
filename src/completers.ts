import type { Completer, CompletionRequest, LLMResponse } from './types.js';
import type { LLMConfig } from './library/llm/types.js';
import { callLLM } from './library/llm/llm-client.js';
import { resolveLLMConfig } from './library/config.js';

/**
 * Configuration for function completer.
 */
export interface FnConfig {
  fn: (request: CompletionRequest) => Promise<string | LLMResponse>;
  model?: string;  // Reported when fn returns plain text. Default: 'custom'
}

/**
 * Creates a completer backed by a hosted LLM provider.
 * The API key is resolved once, when the completer is created.
 *
 * @example
 * ```ts
 * const completer = llm({ provider: LLMProviders.openrouter, model: 'openai/gpt-4o' });
 * ```
 */
export function llm(config: LLMConfig = {}): Completer {
  const { provider, apiKey, model } = resolveLLMConfig(config);

  return (request: CompletionRequest): Promise<LLMResponse> =>
    callLLM({
      provider,
      apiKey,
      model,
      prompt: request.prompt,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      timeoutMs: config.timeoutMs,
    });
}

/**
 * Creates a completer from a local function.
 *
 * @example
 * ```ts
 * const completer = fn({
 *   fn: async ({ prompt }) => myModel.generate(prompt),
 * });
 * ```
 */
export function fn(config: FnConfig): Completer {
  const model = config.model ?? 'custom';

  return async (request: CompletionRequest): Promise<LLMResponse> => {
    const result = await config.fn(request);
    if (typeof result === 'string') {
      return { content: result, model, raw: result };
    }
    return result;
  };
}

/**
 * Creates a mock completer for testing and dry runs.
 * Can accept either:
 * - An array of replies (returned in sequence, cycling if more calls than replies)
 * - A function that maps the request to a reply
 *
 * @example Array-based:
 * ```ts
 * const completer = mock([
 *   'DOC_ID: a\nCONSTRUCT: Hope\nQUOTE: it will be fine\nCONFIDENCE: 2',
 *   '',
 * ]);
 * ```
 */
export function mock(
  repliesOrFn: string[] | ((request: CompletionRequest) => string)
): Completer {
  // Function-based mock
  if (typeof repliesOrFn === 'function') {
    return async (request: CompletionRequest): Promise<LLMResponse> => {
      const content = repliesOrFn(request);
      return { content, model: 'mock', raw: content };
    };
  }

  // Array-based mock
  const replies = repliesOrFn;
  if (replies.length === 0) {
    throw new Error('mock() requires at least one reply');
  }

  let callIndex = 0;

  return async (): Promise<LLMResponse> => {
    const content = replies[callIndex % replies.length];
    callIndex++;
    return { content, model: 'mock', raw: content };
  };
}
