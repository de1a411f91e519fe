import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Codebook, Construct } from '../types.js';
import {
  EXAMPLE_SEPARATOR,
  SUPPORTED_CODEBOOK_EXTENSIONS,
} from '../library/constants.js';
import {
  CodebookFormatError,
  EmptyInputError,
  NotFoundError,
  UnsupportedFormatError,
  errorMessage,
} from '../library/errors.js';
import { readCsv } from '../library/csv.js';
import { statOrUndefined } from '../library/files.js';

// ═══════════════════════════════════════════════════════════════════════════
// JSON SHAPES
// ═══════════════════════════════════════════════════════════════════════════

const constructDetails = {
  definition: z.string().default(''),
  examples: z.array(z.string()).default([]),
};

const constructEntry = z.object({ name: z.string(), ...constructDetails });

// { "constructs": [{ "name": ..., "definition": ... }] }
const wrappedCodebook = z.object({ constructs: z.array(constructEntry) });
// [{ "name": ..., "definition": ... }]
const listCodebook = z.array(constructEntry);
// { "<name>": { "definition": ..., "examples": [...] } }
const mappingCodebook = z.record(z.object(constructDetails));

const JSON_FORMAT_HELP = [
  'Supported formats:',
  `1. {"constructs": [{"name": "...", "definition": "..."}]}`,
  `2. [{"name": "...", "definition": "..."}]`,
  `3. {"construct_name": {"definition": "...", "examples": [...]}}`,
].join('\n');

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Build constructs from parsed JSON in one of the three supported shapes.
 */
export function parseCodebookJson(data: unknown): Construct[] {
  let error: z.ZodError | undefined;

  if (isPlainObject(data) && 'constructs' in data) {
    const result = wrappedCodebook.safeParse(data);
    if (result.success) return result.data.constructs;
    error = result.error;
  } else if (Array.isArray(data)) {
    const result = listCodebook.safeParse(data);
    if (result.success) return result.data;
    error = result.error;
  } else if (isPlainObject(data)) {
    const result = mappingCodebook.safeParse(data);
    if (result.success) {
      return Object.entries(result.data).map(([name, details]) => ({
        name,
        ...details,
      }));
    }
    error = result.error;
  }

  const issue = error?.issues[0];
  const detail = issue
    ? ` (${issue.path.join('.') || 'root'}: ${issue.message})`
    : '';
  throw new CodebookFormatError(`JSON codebook format not recognized${detail}. ${JSON_FORMAT_HELP}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// CSV
// ═══════════════════════════════════════════════════════════════════════════

function splitExamples(value: string): string[] {
  return value
    .split(EXAMPLE_SEPARATOR)
    .map((example) => example.trim())
    .filter(Boolean);
}

function firstColumn(row: Record<string, string>, keys: string[]): string {
  for (const key of keys) {
    if (key in row) return row[key] ?? '';
  }
  return '';
}

/**
 * Build constructs from CSV text with name/definition/examples columns.
 * Rows without a name are skipped.
 */
export async function parseCodebookCsv(content: string): Promise<Construct[]> {
  const { headers, rows } = await readCsv(content);
  if (!headers || headers.length === 0) {
    throw new EmptyInputError('CSV file appears to be empty');
  }

  const constructs: Construct[] = [];
  for (const row of rows) {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) {
      normalized[key.trim().toLowerCase()] = value;
    }

    const name = firstColumn(normalized, ['name', 'construct']).trim();
    if (!name) continue;

    constructs.push({
      name,
      definition: firstColumn(normalized, ['definition', 'description']).trim(),
      examples: splitExamples(firstColumn(normalized, ['examples', 'example'])),
    });
  }
  return constructs;
}

// ═══════════════════════════════════════════════════════════════════════════
// TEXT
// ═══════════════════════════════════════════════════════════════════════════

const TAG_CONSTRUCT = 'CONSTRUCT:';
const TAG_DEFINITION = 'DEFINITION:';
const TAG_EXAMPLES = 'EXAMPLES:';

/**
 * Tagged format: CONSTRUCT: / DEFINITION: / EXAMPLES: lines.
 */
function parseTaggedText(content: string): Construct[] {
  const constructs: Construct[] = [];
  let current: Construct | undefined;

  for (const line of content.split('\n')) {
    const stripped = line.trim();
    const upper = stripped.toUpperCase();

    if (upper.startsWith(TAG_CONSTRUCT)) {
      if (current) constructs.push(current);
      current = {
        name: stripped.slice(TAG_CONSTRUCT.length).trim(),
        definition: '',
        examples: [],
      };
    } else if (current && upper.startsWith(TAG_DEFINITION)) {
      current.definition = stripped.slice(TAG_DEFINITION.length).trim();
    } else if (current && upper.startsWith(TAG_EXAMPLES)) {
      current.examples = splitExamples(stripped.slice(TAG_EXAMPLES.length));
    }
  }

  if (current) constructs.push(current);
  return constructs.filter((construct) => construct.name);
}

/**
 * Simple format: blank-line separated blocks, name line then definition lines.
 */
function parseSimpleText(content: string): Construct[] {
  const constructs: Construct[] = [];

  for (const block of content.trim().split(/\n\s*\n/)) {
    const lines = block
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
    if (lines.length === 0) continue;

    constructs.push({
      name: lines[0],
      definition: lines.slice(1).join(' '),
      examples: [],
    });
  }
  return constructs;
}

/**
 * Build constructs from a plain-text codebook, picking the tagged format when
 * any line carries a CONSTRUCT: tag.
 */
export function parseCodebookText(content: string): Construct[] {
  return content.toUpperCase().includes(TAG_CONSTRUCT)
    ? parseTaggedText(content)
    : parseSimpleText(content);
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING & FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Load a codebook from a .json, .csv or .txt file.
 *
 * @throws NotFoundError when the file does not exist
 * @throws UnsupportedFormatError for any other extension
 */
export async function loadCodebook(filePath: string): Promise<Codebook> {
  const extension = path.extname(filePath).toLowerCase();
  const supported = SUPPORTED_CODEBOOK_EXTENSIONS.some((ext) => ext === extension);

  if (!(await statOrUndefined(filePath))) {
    throw new NotFoundError(`Codebook file not found: ${filePath}`, filePath);
  }
  if (!supported) {
    throw new UnsupportedFormatError(
      `Unsupported codebook format: ${extension || '(none)'}. Supported formats: ${SUPPORTED_CODEBOOK_EXTENSIONS.join(', ')}`,
      extension
    );
  }

  const content = await fs.readFile(filePath, 'utf-8');

  let constructs: Construct[];
  if (extension === '.json') {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new CodebookFormatError(
        `Invalid JSON in codebook ${filePath}: ${errorMessage(error)}`
      );
    }
    constructs = parseCodebookJson(data);
  } else if (extension === '.csv') {
    constructs = await parseCodebookCsv(content);
  } else {
    constructs = parseCodebookText(content);
  }

  return { constructs, source: filePath };
}

/**
 * Render one construct for the prompt.
 */
export function formatConstruct(construct: Construct): string {
  let result = `Construct: ${construct.name}\nDefinition: ${construct.definition}`;
  if (construct.examples.length > 0) {
    result += `\nExamples:\n  - ${construct.examples.join('\n  - ')}`;
  }
  return result;
}

/**
 * Render the whole codebook for the prompt, constructs separated by a blank line.
 */
export function formatCodebook(codebook: Codebook): string {
  return codebook.constructs.map(formatConstruct).join('\n\n');
}
