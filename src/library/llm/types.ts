import type { LLMProviders } from '../../types.js';

/**
 * Configuration for calling an LLM (internal).
 */
export interface CallLLMConfig {
  provider: LLMProviders;
  apiKey: string;
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
}

/**
 * Options for building a provider-backed completer.
 */
export interface LLMConfig {
  provider?: LLMProviders;  // Default: openrouter
  apiKey?: string;          // Default: the provider's API key environment variable
  model?: string;           // Default: the provider's default model
  timeoutMs?: number;       // Default: 120000
}
