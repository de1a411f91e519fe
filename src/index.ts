// Re-export types
export type {
  // Document types
  Document,
  // Codebook types
  Construct,
  Codebook,
  // Result types
  EncodingInstance,
  ResultColumn,
  ResultRow,
  ResultTable,
  // LLM types
  TokenUsage,
  LLMResponse,
  CompletionRequest,
  Completer,
  // Encoder types
  PromptOptions,
  EncodeConfig,
  EncodeTextConfig,
  SingleDocumentConfig,
  DocumentResult,
  EncodeResult,
} from './types.js';
export type { LLMConfig } from './library/llm/types.js';
export type { FnConfig } from './completers.js';
export type { ParsedFields } from './parsing/parser.js';
export type { PromptValues } from './prompts/prompts.js';

// Re-export enums and constants
export { LLMProviders, RESULT_COLUMNS } from './types.js';

// Re-export errors
export {
  NotFoundError,
  UnsupportedFormatError,
  EmptyInputError,
  NoDocumentsError,
  CodebookFormatError,
  PromptTemplateError,
  ConfigError,
  LLMCallError,
} from './library/errors.js';

// Re-export building blocks
export { detectSpeakers } from './documents/speakers.js';
export { loadDocuments, loadFile, loadDocumentFromText } from './documents/documents.js';
export { parseResponse, parseBlock, parseConfidence, splitBlocks } from './parsing/parser.js';
export { toTable, mergeTables, formatTableCsv, writeTable } from './parsing/results.js';
export {
  loadCodebook,
  parseCodebookJson,
  parseCodebookCsv,
  parseCodebookText,
  formatConstruct,
  formatCodebook,
} from './codebook/codebook.js';
export {
  DEFAULT_PROMPT,
  DEFAULT_SCORING_CRITERIA,
  createPromptTemplate,
  formatPrompt,
} from './prompts/prompts.js';
export { callLLM, getAvailableModels } from './library/llm/llm-client.js';

// Re-export completers
export { llm, fn, mock } from './completers.js';

// Re-export encoder
export { encode, encodeText, getRawResponse, previewPrompt } from './encoder/encoder.js';

// Main namespace
import type {
  Completer,
  EncodeConfig,
  EncodeResult,
  EncodeTextConfig,
  LLMResponse,
  SingleDocumentConfig,
} from './types.js';
import type { LLMConfig } from './library/llm/types.js';
import { encode, encodeText, getRawResponse, previewPrompt } from './encoder/encoder.js';
import { llm as createLLM } from './completers.js';

/**
 * Main namespace for the fluent API.
 *
 * @example
 * ```ts
 * import { constructEncoder } from 'construct-encoder';
 *
 * const result = await constructEncoder.encode({
 *   documents: './interviews/',
 *   codebook: './codebook.json',
 *   completer: constructEncoder.llm({ model: 'openai/gpt-4o' }),
 * });
 *
 * console.log(`${result.table.rows.length} instances`);
 * ```
 */
export const constructEncoder = {
  /**
   * Encode constructs in a file, a directory, or loaded documents.
   */
  encode(config: EncodeConfig): Promise<EncodeResult> {
    return encode(config);
  },

  /**
   * Encode a single text string.
   */
  encodeText(text: string, config: EncodeTextConfig): Promise<EncodeResult> {
    return encodeText(text, config);
  },

  /**
   * Get the raw model reply for one document.
   */
  rawResponse(config: SingleDocumentConfig & { completer: Completer }): Promise<LLMResponse> {
    return getRawResponse(config);
  },

  /**
   * Preview the prompt for one document.
   */
  preview(config: SingleDocumentConfig): Promise<string> {
    return previewPrompt(config);
  },

  /**
   * Create a completer backed by a hosted LLM provider.
   */
  llm(config?: LLMConfig): Completer {
    return createLLM(config);
  },
};

// Default export
export default constructEncoder;
