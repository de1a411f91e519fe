import * as fs from 'fs';
import * as path from 'path';
import type { DocumentResult, EncodeResult, ResultRow } from '../types.js';
import {
  theme,
  spinner,
  createProgressTracker,
  formatCount,
  formatDuration,
  formatTokens,
  type ProgressTracker,
} from '../library/ui.js';
import { errorMessage } from '../library/errors.js';

/**
 * Structure for rawData.json output from encode()
 */
export interface EncodeReport {
  metadata: {
    timestamp: string;
    model: string;
    promptTemplate: string;
    documentCount: number;
    maxTokens: number;
    temperature: number;
  };
  summary: {
    documents: number;
    instances: number;
    promptTokens: number;
    completionTokens: number;
    durationMs: number;
  };
  documents: DocumentData[];
}

interface DocumentData {
  index: number;
  docId: string;
  model: string;
  durationMs: number;
  promptTokens?: number;
  completionTokens?: number;
  response: string;
  rows: readonly ResultRow[];
}

/** Settings captured in the report metadata */
export interface EncodeLogContext {
  promptTemplate: string;
  maxTokens: number;
  temperature: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS TRACKING
// ═══════════════════════════════════════════════════════════════════════════

/** Progress bar updater interface */
export interface ProgressUpdater {
  update(completed: number, total: number, label?: string): void;
  finish(): void;
}

/**
 * Progress updater that starts its bar lazily on the first update.
 * A disabled updater ignores every call.
 */
export function createProgressUpdater(unit: string, enabled = true): ProgressUpdater {
  let tracker: ProgressTracker | null = null;

  return {
    update(completed: number, total: number, label?: string) {
      if (!enabled) return;
      if (!tracker) {
        tracker = createProgressTracker(unit);
        tracker.start(total);
      }
      tracker.update(completed, label);
    },

    finish() {
      if (tracker) {
        tracker.stop();
        tracker = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSOLE LOGGING
// ═══════════════════════════════════════════════════════════════════════════

export function logEncodeHeader(
  documentCount: number,
  constructCount: number
): void {
  spinner.stop();
  console.log('');
  console.log(theme.bold('Construct Encoder'));
  console.log(
    `  ${theme.dim('Documents:')} ${documentCount}${theme.separator}${theme.dim('Constructs:')} ${constructCount}`
  );
  console.log('');
}

export function logEncodeComplete(result: EncodeResult): void {
  spinner.stop();
  const { promptTokens, completionTokens } = sumUsage(result.documents);

  console.log('');
  console.log(theme.divider('Complete'));
  console.log(
    `  ${theme.check} ${theme.bold(formatCount(result.table.rows.length, 'instance'))} from ${formatCount(result.documents.length, 'document')}`
  );
  console.log(
    `  ${theme.dim('Tokens:')} ${formatTokens(promptTokens)} in / ${formatTokens(completionTokens)} out${theme.separator}${theme.dim(formatDuration(result.durationMs))}`
  );
}

export function logDocumentFailed(docId: string, error: unknown): void {
  spinner.stop();
  console.error(
    `  ${theme.cross} ${theme.error(`Encoding failed for ${docId}`)}${theme.separator}${theme.dim(errorMessage(error))}`
  );
}

export function logLogsWritten(logPath: string): void {
  spinner.stop();
  console.log(`  ${theme.dim('Logs written to:')} ${logPath}`);
  console.log('');
}

// ═══════════════════════════════════════════════════════════════════════════
// RAW DATA
// ═══════════════════════════════════════════════════════════════════════════

function sumUsage(documents: readonly DocumentResult[]): {
  promptTokens: number;
  completionTokens: number;
} {
  let promptTokens = 0;
  let completionTokens = 0;
  for (const doc of documents) {
    promptTokens += doc.usage?.promptTokens ?? 0;
    completionTokens += doc.usage?.completionTokens ?? 0;
  }
  return { promptTokens, completionTokens };
}

/**
 * Build the rawData.json report for an encode run.
 */
export function buildEncodeReport(
  result: EncodeResult,
  context: EncodeLogContext,
  timestamp: Date = new Date()
): EncodeReport {
  const { promptTokens, completionTokens } = sumUsage(result.documents);
  const models = [...new Set(result.documents.map((doc) => doc.model))];

  return {
    metadata: {
      timestamp: timestamp.toISOString(),
      model: models.join(', '),
      promptTemplate: context.promptTemplate,
      documentCount: result.documents.length,
      maxTokens: context.maxTokens,
      temperature: context.temperature,
    },
    summary: {
      documents: result.documents.length,
      instances: result.table.rows.length,
      promptTokens,
      completionTokens,
      durationMs: result.durationMs,
    },
    documents: result.documents.map((doc, index) => ({
      index,
      docId: doc.docId,
      model: doc.model,
      durationMs: doc.durationMs,
      promptTokens: doc.usage?.promptTokens,
      completionTokens: doc.usage?.completionTokens,
      response: doc.response,
      rows: doc.table.rows,
    })),
  };
}

/**
 * Write encode results to rawData.json.
 *
 * Errors are reported and swallowed: the run already succeeded, only
 * persisting its log failed.
 *
 * @returns true when the file was written
 */
export function writeEncodeLogs(
  logPath: string,
  result: EncodeResult,
  context: EncodeLogContext
): boolean {
  try {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const report = buildEncodeReport(result, context);
    fs.writeFileSync(logPath, JSON.stringify(report, null, 2), 'utf-8');
    return true;
  } catch (error) {
    console.error(`Failed to write encode logs to ${logPath}:`, errorMessage(error));
    return false;
  }
}
