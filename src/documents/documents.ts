import * as fs from 'fs/promises';
import * as path from 'path';
import type { Document } from '../types.js';
import {
  CSV_SAMPLE_SIZE,
  CSV_SPEAKER_COLUMNS,
  CSV_TABLE_HINTS,
  CSV_TEXT_COLUMNS,
  INLINE_DOCUMENT_ID,
  INLINE_DOCUMENT_SOURCE,
  SUPPORTED_DOCUMENT_EXTENSIONS,
} from '../library/constants.js';
import {
  EmptyInputError,
  NoDocumentsError,
  NotFoundError,
  UnsupportedFormatError,
} from '../library/errors.js';
import { readCsv } from '../library/csv.js';
import { statOrUndefined } from '../library/files.js';
import { detectSpeakers } from './speakers.js';
import { logFileSkipped } from './document-logging.js';

const SUPPORTED_LIST = SUPPORTED_DOCUMENT_EXTENSIONS.join(', ');

function isSupportedExtension(extension: string): boolean {
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === extension);
}

function documentId(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Load documents from a file or a directory.
 *
 * A directory loads every .txt / .csv file in name order. Files that fail to load are
 * reported and skipped; the call only fails when none load.
 *
 * @throws NotFoundError when the path does not exist
 * @throws NoDocumentsError when a directory yields no documents
 */
export async function loadDocuments(inputPath: string): Promise<Document[]> {
  const stats = await statOrUndefined(inputPath);
  if (!stats) {
    throw new NotFoundError(`Path not found: ${inputPath}`, inputPath);
  }

  if (stats.isDirectory()) {
    return loadDirectory(inputPath);
  }
  return [await loadFile(inputPath)];
}

async function loadDirectory(directory: string): Promise<Document[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files = entries
    .filter(
      (entry) =>
        entry.isFile() &&
        isSupportedExtension(path.extname(entry.name).toLowerCase())
    )
    .map((entry) => entry.name)
    .sort();

  const documents: Document[] = [];
  for (const name of files) {
    const filePath = path.join(directory, name);
    try {
      documents.push(await loadFile(filePath));
    } catch (error) {
      logFileSkipped(filePath, error);
    }
  }

  if (documents.length === 0) {
    throw new NoDocumentsError(
      `No valid documents found in directory: ${directory}. Supported formats: ${SUPPORTED_LIST}`,
      directory
    );
  }

  return documents;
}

/**
 * Load a single document, dispatching on the file extension.
 */
export async function loadFile(filePath: string): Promise<Document> {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === '.txt') {
    return loadTxt(filePath);
  }
  if (extension === '.csv') {
    return loadCsv(filePath);
  }
  throw new UnsupportedFormatError(
    `Unsupported document format: ${extension || '(none)'}. Supported formats: ${SUPPORTED_LIST}`,
    extension
  );
}

async function loadTxt(filePath: string): Promise<Document> {
  const content = await fs.readFile(filePath, 'utf-8');
  return {
    id: documentId(filePath),
    content,
    speakers: detectSpeakers(content),
    source: filePath,
  };
}

/**
 * Reduce a transcript table to text.
 * Either "speaker + text" columns or a single text column; a file without any
 * recognizable column names is treated as raw text.
 */
async function loadCsv(filePath: string): Promise<Document> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const sample = raw.slice(0, CSV_SAMPLE_SIZE).toLowerCase();

  let content = raw;
  let speakers: string[] = [];

  if (CSV_TABLE_HINTS.some((hint) => sample.includes(hint))) {
    const table = await csvTranscript(raw);
    content = table.content;
    speakers = table.speakers;
  }

  return {
    id: documentId(filePath),
    content,
    // Speakers from the table keep their encounter order
    speakers: speakers.length > 0 ? speakers : detectSpeakers(content),
    source: filePath,
  };
}

async function csvTranscript(
  raw: string
): Promise<{ content: string; speakers: string[] }> {
  const { headers, rows } = await readCsv(raw);
  if (!headers || headers.length === 0) {
    throw new EmptyInputError('CSV file appears to be empty');
  }

  let speakerColumn: string | undefined;
  let textColumn: string | undefined;
  for (const header of headers) {
    const key = header.trim().toLowerCase();
    if (CSV_SPEAKER_COLUMNS.includes(key)) {
      speakerColumn = header;
    } else if (CSV_TEXT_COLUMNS.includes(key)) {
      textColumn = header;
    }
  }
  const textKey = textColumn ?? headers[0];

  const lines: string[] = [];
  const speakers = new Set<string>();
  for (const row of rows) {
    const text = (row[textKey] ?? '').trim();
    const speaker = speakerColumn ? (row[speakerColumn] ?? '').trim() : '';
    if (speaker) {
      speakers.add(speaker);
      lines.push(`${speaker}: ${text}`);
    } else {
      lines.push(text);
    }
  }

  return { content: lines.join('\n'), speakers: [...speakers] };
}

/**
 * Create a document from in-memory text.
 */
export function loadDocumentFromText(
  text: string,
  id: string = INLINE_DOCUMENT_ID
): Document {
  if (!id) {
    throw new Error('Document id cannot be empty');
  }
  return {
    id,
    content: text,
    speakers: detectSpeakers(text),
    source: INLINE_DOCUMENT_SOURCE,
  };
}
