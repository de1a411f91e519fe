import * as crypto from 'crypto';
import * as path from 'path';
import type {
  Codebook,
  Completer,
  Document,
  DocumentResult,
  EncodeConfig,
  EncodeResult,
  EncodeTextConfig,
  LLMResponse,
  SingleDocumentConfig,
} from '../types.js';
import {
  DEFAULT_LOG_ROOT,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from '../library/constants.js';
import { loadDocuments, loadDocumentFromText } from '../documents/documents.js';
import { loadCodebook } from '../codebook/codebook.js';
import { buildDocumentPrompt, createPromptTemplate } from '../prompts/prompts.js';
import { parseResponse } from '../parsing/parser.js';
import { mergeTables, toTable } from '../parsing/results.js';
import {
  createProgressUpdater,
  logDocumentFailed,
  logEncodeComplete,
  logEncodeHeader,
  logLogsWritten,
  writeEncodeLogs,
} from './encoder-logging.js';
import { spinner } from '../library/ui.js';

async function resolveDocuments(documents: string | Document[]): Promise<Document[]> {
  return typeof documents === 'string' ? loadDocuments(documents) : documents;
}

async function resolveDocument(document: string | Document): Promise<Document> {
  if (typeof document !== 'string') {
    return document;
  }
  const [first] = await loadDocuments(document);
  return first;
}

async function resolveCodebook(codebook: string | Codebook): Promise<Codebook> {
  return typeof codebook === 'string' ? loadCodebook(codebook) : codebook;
}

interface EncodeDocumentOptions {
  template: string;
  codebook: Codebook;
  completer: Completer;
  maxTokens: number;
  temperature: number;
}

/**
 * Run one document through the model and parse the reply.
 * The document's own id is stamped on every instance.
 */
async function encodeDocument(
  document: Document,
  options: EncodeDocumentOptions
): Promise<DocumentResult> {
  const start = Date.now();
  const response = await options.completer({
    prompt: buildDocumentPrompt(options.template, document, options.codebook),
    maxTokens: options.maxTokens,
    temperature: options.temperature,
  });

  const instances = parseResponse(response.content, document.id);
  return {
    docId: document.id,
    table: toTable(instances),
    model: response.model,
    usage: response.usage,
    response: response.content,
    durationMs: Date.now() - start,
  };
}

/**
 * Encode constructs in one or more documents.
 *
 * Documents are processed one at a time, in order. A failed model call aborts
 * the run; tables already handed to `onDocumentComplete` stay with the caller.
 */
export async function encode(config: EncodeConfig): Promise<EncodeResult> {
  const { completer, onDocumentComplete } = config;
  const showProgress = config.showProgress ?? true;

  if (!completer) {
    throw new Error('completer is required');
  }

  const startTime = Date.now();

  // Validate the prompt before any I/O
  const template = createPromptTemplate(config.prompt);
  if (showProgress) {
    spinner.start('Loading documents and codebook');
  }
  let documents: Document[];
  let codebook: Codebook;
  try {
    documents = await resolveDocuments(config.documents);
    codebook = await resolveCodebook(config.codebook);
  } catch (error) {
    spinner.fail('Failed to load input');
    throw error;
  }

  const options: EncodeDocumentOptions = {
    template,
    codebook,
    completer,
    maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: config.temperature ?? DEFAULT_TEMPERATURE,
  };

  // Resolve log path if storeLogs is enabled
  const logPath = config.storeLogs
    ? typeof config.storeLogs === 'string'
      ? config.storeLogs
      : `${DEFAULT_LOG_ROOT}/encode_${startTime}_${crypto.randomUUID().slice(0, 8)}/rawData.json`
    : undefined;

  if (showProgress) {
    logEncodeHeader(documents.length, codebook.constructs.length);
  }
  const progress = createProgressUpdater('documents', showProgress);

  const results: DocumentResult[] = [];
  for (const document of documents) {
    progress.update(results.length, documents.length, document.id);

    let result: DocumentResult;
    try {
      result = await encodeDocument(document, options);
    } catch (error) {
      progress.finish();
      if (showProgress) {
        logDocumentFailed(document.id, error);
      }
      throw error;
    }

    results.push(result);
    onDocumentComplete?.(result.docId, result.table);
  }
  progress.update(results.length, documents.length);
  progress.finish();

  const encodeResult: EncodeResult = {
    table: mergeTables(results.map((r) => r.table)),
    documents: results,
    durationMs: Date.now() - startTime,
  };

  if (showProgress) {
    logEncodeComplete(encodeResult);
  }

  if (logPath) {
    const written = writeEncodeLogs(logPath, encodeResult, {
      promptTemplate: template,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });
    if (written) {
      const logFolder = path.dirname(logPath);
      if (showProgress) {
        logLogsWritten(logFolder);
      }
      return { ...encodeResult, logFolder };
    }
  }

  return encodeResult;
}

/**
 * Encode a single in-memory text. Progress output is off.
 */
export async function encodeText(
  text: string,
  config: EncodeTextConfig
): Promise<EncodeResult> {
  const { docId, ...rest } = config;
  const document = loadDocumentFromText(text, docId);
  return encode({ ...rest, documents: [document], showProgress: false });
}

/**
 * Get the unparsed model reply for one document, for debugging.
 * A path loads its first document.
 */
export async function getRawResponse(
  config: SingleDocumentConfig & { completer: Completer }
): Promise<LLMResponse> {
  const prompt = await previewPrompt(config);
  return config.completer({
    prompt,
    maxTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: config.temperature ?? DEFAULT_TEMPERATURE,
  });
}

/**
 * Format the prompt that would be sent for one document, without calling a model.
 */
export async function previewPrompt(config: SingleDocumentConfig): Promise<string> {
  const template = createPromptTemplate(config.prompt);
  const document = await resolveDocument(config.document);
  const codebook = await resolveCodebook(config.codebook);
  return buildDocumentPrompt(template, document, codebook);
}
