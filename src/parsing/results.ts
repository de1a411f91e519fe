import * as fs from 'fs';
import * as path from 'path';
import type { EncodingInstance, ResultRow, ResultTable } from '../types.js';
import { RESULT_COLUMNS } from '../types.js';
import { UnsupportedFormatError } from '../library/errors.js';

/**
 * Convert parsed instances into a result table, preserving order.
 */
export function toTable(instances: readonly EncodingInstance[]): ResultTable {
  const rows: ResultRow[] = instances.map((instance) => ({
    doc_id: instance.docId,
    speaker_id: instance.speakerId,
    construct: instance.construct,
    quote: instance.quote,
    confidence: instance.confidence,
  }));
  return { columns: RESULT_COLUMNS, rows };
}

/**
 * Concatenate per-document tables in input order.
 * An empty list gives the same zero-row table as `toTable([])`.
 */
export function mergeTables(tables: readonly ResultTable[]): ResultTable {
  const rows: ResultRow[] = [];
  for (const table of tables) {
    rows.push(...table.rows);
  }
  return { columns: RESULT_COLUMNS, rows };
}

function csvEscape(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render a table as CSV with a header line.
 */
export function formatTableCsv(table: ResultTable): string {
  const lines = [table.columns.join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => csvEscape(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Write a table to disk. The extension picks the format (.csv or .json).
 */
export function writeTable(table: ResultTable, outputPath: string): void {
  const extension = path.extname(outputPath).toLowerCase();

  let content: string;
  if (extension === '.csv') {
    content = formatTableCsv(table);
  } else if (extension === '.json') {
    content = JSON.stringify(table.rows, null, 2) + '\n';
  } else {
    throw new UnsupportedFormatError(
      `Unsupported output format: ${extension || '(none)'}. Supported formats: .csv, .json`,
      extension
    );
  }

  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outputPath, content, 'utf-8');
}
