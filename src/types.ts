// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A loaded interview transcript.
 */
export interface Document {
  readonly id: string;
  readonly content: string;
  readonly speakers: readonly string[];
  readonly source: string;  // File path, or '<string>' for in-memory text
}

// ═══════════════════════════════════════════════════════════════════════════
// CODEBOOK
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A single psychological construct from a codebook.
 */
export interface Construct {
  name: string;
  definition: string;
  examples: string[];
}

/**
 * A collection of constructs, optionally tied to the file it was read from.
 */
export interface Codebook {
  constructs: Construct[];
  source?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One occurrence of a construct found in a document.
 */
export interface EncodingInstance {
  readonly docId: string;
  readonly speakerId: string;
  readonly construct: string;
  readonly quote: string;
  readonly confidence: number;  // 0-2, or -1 when missing/unparseable
}

export const RESULT_COLUMNS = [
  'doc_id',
  'speaker_id',
  'construct',
  'quote',
  'confidence',
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

/**
 * A single row of the result table.
 */
export interface ResultRow {
  doc_id: string;
  speaker_id: string;
  construct: string;
  quote: string;
  confidence: number;
}

/**
 * Ordered rows with a fixed column header. The header is present even with zero rows.
 */
export interface ResultTable {
  readonly columns: typeof RESULT_COLUMNS;
  readonly rows: readonly ResultRow[];
}

// ═══════════════════════════════════════════════════════════════════════════
// LLM
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Supported LLM providers.
 */
export enum LLMProviders {
  openrouter = 'openrouter',
  openai = 'openai',
  anthropic = 'anthropic',
}

/**
 * Token usage reported by the provider.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Response from a completion call.
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
  raw: unknown;
}

/**
 * A single completion request.
 */
export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Sends a prompt to a model and returns its reply.
 */
export type Completer = (request: CompletionRequest) => Promise<LLMResponse>;

// ═══════════════════════════════════════════════════════════════════════════
// ENCODER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Prompt customization. At most one of `template` and `scoringCriteria` may be set.
 */
export interface PromptOptions {
  template?: string;         // Must contain {text} and {codebook}
  scoringCriteria?: string;  // Replaces the scoring instruction of the default prompt
}

/**
 * Shared options for all encoder entry points.
 */
interface BaseEncodeConfig {
  codebook: string | Codebook;
  completer: Completer;
  prompt?: PromptOptions;
  maxTokens?: number;    // Default: 4096
  temperature?: number;  // Default: 0.1
}

/**
 * Configuration for encoding a batch of documents.
 */
export interface EncodeConfig extends BaseEncodeConfig {
  documents: string | Document[];
  showProgress?: boolean;  // Default: true
  onDocumentComplete?: (docId: string, table: ResultTable) => void;
  storeLogs?: boolean | string;  // true = "./encoding-logs/encode_<timestamp>_<id>/rawData.json", string = custom path
}

/**
 * Configuration for encoding a single in-memory text.
 */
export interface EncodeTextConfig extends BaseEncodeConfig {
  docId?: string;  // Default: 'inline'
}

/**
 * Configuration for the single-document helpers (raw response, prompt preview).
 */
export interface SingleDocumentConfig extends Omit<BaseEncodeConfig, 'completer'> {
  document: string | Document;
}

/**
 * Result for a single encoded document.
 */
export interface DocumentResult {
  docId: string;
  table: ResultTable;
  model: string;
  usage?: TokenUsage;
  response: string;
  durationMs: number;
}

/**
 * Final result of an encode run.
 */
export interface EncodeResult {
  table: ResultTable;
  documents: DocumentResult[];
  durationMs: number;
  logFolder?: string;
}
