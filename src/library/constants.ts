import { LLMProviders } from '../types.js';

// LLM provider configuration
export interface ProviderSpec {
  defaultModel: string;
  apiKeyEnv: string;
  baseURL?: string;
}

export const PROVIDER_SPECS: Record<LLMProviders, ProviderSpec> = {
  [LLMProviders.openrouter]: { defaultModel: 'meta-llama/llama-3.3-70b-instruct:free', apiKeyEnv: 'OPENROUTER_API_KEY', baseURL: 'https://openrouter.ai/api/v1' },
  [LLMProviders.openai]: { defaultModel: 'gpt-4o', apiKeyEnv: 'OPENAI_API_KEY' },
  [LLMProviders.anthropic]: { defaultModel: 'claude-sonnet-4-5', apiKeyEnv: 'ANTHROPIC_API_KEY' },
};

export const DEFAULT_PROVIDER = LLMProviders.openrouter;
export const DEFAULT_LLM_TIMEOUT_MS = 120_000;

// Sent to OpenRouter for app attribution
export const OPENROUTER_HEADERS = {
  'HTTP-Referer': 'https://github.com/construct-encoder',
  'X-Title': 'Construct Encoder',
};

// Encoder constants
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_LOG_ROOT = './encoding-logs';
export const INLINE_DOCUMENT_ID = 'inline';
export const INLINE_DOCUMENT_SOURCE = '<string>';

// Document constants
export const SUPPORTED_DOCUMENT_EXTENSIONS = ['.txt', '.csv'] as const;
// Characters scanned to decide whether a CSV has named columns. Tunable.
export const CSV_SAMPLE_SIZE = 2048;
export const CSV_TABLE_HINTS = ['speaker', 'text', 'content', 'utterance'];
export const CSV_SPEAKER_COLUMNS = ['speaker', 'speaker_id', 'participant', 'id'];
export const CSV_TEXT_COLUMNS = ['text', 'content', 'utterance', 'transcript', 'message'];

// Codebook constants
export const SUPPORTED_CODEBOOK_EXTENSIONS = ['.json', '.csv', '.txt'] as const;
export const EXAMPLE_SEPARATOR = ';';

// Parser constants
export const MISSING_CONFIDENCE = -1;
