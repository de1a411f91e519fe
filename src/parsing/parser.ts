import type { EncodingInstance } from '../types.js';
import { MISSING_CONFIDENCE } from '../library/constants.js';

/**
 * Fields a block may carry, before defaults are applied.
 * A field is undefined when its label was not found in the block.
 */
export interface ParsedFields {
  docId?: string;
  speakerId?: string;
  construct?: string;
  quote?: string;
  confidence?: string;
}

/**
 * A labeled field rule. `label` is a regex source matched case-insensitively.
 * Text fields run until the next recognized label; `capture` narrows the value instead.
 */
interface FieldRule {
  field: keyof ParsedFields;
  label: string;
  capture?: string;
}

// Evaluated independently per block, so field order in the reply does not matter.
const FIELD_RULES: readonly FieldRule[] = [
  { field: 'docId', label: 'DOC[_ ]?ID' },
  { field: 'speakerId', label: 'SPEAKER[_ ]?ID' },
  { field: 'construct', label: 'CONSTRUCT' },
  { field: 'quote', label: 'QUOTE' },
  { field: 'confidence', label: 'CONFIDENCE', capture: '\\d+' },
];

const ANY_LABEL = FIELD_RULES.map((rule) => rule.label).join('|');

const BLOCK_DELIMITER = /\n(?=DOC[_ ]ID:)/i;

function buildFieldPattern(rule: FieldRule): RegExp {
  const head = `\\b(?:${rule.label})\\s*:\\s*`;
  if (rule.capture) {
    return new RegExp(`${head}(${rule.capture})`, 'i');
  }
  const terminator = `(?=\\s*\\b(?:${ANY_LABEL})\\s*:|\\s*$)`;
  return new RegExp(`${head}([\\s\\S]*?)${terminator}`, 'i');
}

const FIELD_PATTERNS = FIELD_RULES.map((rule) => ({
  field: rule.field,
  pattern: buildFieldPattern(rule),
}));

/**
 * Split a raw reply into instance blocks.
 * Splits on each newline followed by a DOC_ID / DOC ID marker; the marker stays with
 * the block it starts. Text without any marker is a single block.
 */
export function splitBlocks(responseText: string): string[] {
  return responseText.split(BLOCK_DELIMITER);
}

/**
 * Extract the labeled fields from one block.
 */
export function parseBlock(block: string): ParsedFields {
  const fields: ParsedFields = {};
  for (const { field, pattern } of FIELD_PATTERNS) {
    const match = pattern.exec(block);
    if (match) {
      fields[field] = match[1].trim();
    }
  }
  return fields;
}

/**
 * Parse a captured confidence value. Returns -1 when nothing numeric is present
 * or the number is not a safe integer.
 */
export function parseConfidence(value: string | undefined): number {
  if (value === undefined) {
    return MISSING_CONFIDENCE;
  }
  const trimmed = value.trim();
  const match = /^[+-]?\d+$/.test(trimmed) ? trimmed : /\d+/.exec(trimmed)?.[0];
  if (match === undefined) {
    return MISSING_CONFIDENCE;
  }
  const parsed = Number.parseInt(match, 10);
  return Number.isSafeInteger(parsed) ? parsed : MISSING_CONFIDENCE;
}

function toInstance(
  fields: ParsedFields,
  knownDocId: string
): EncodingInstance | undefined {
  if (!fields.construct) {
    return undefined;
  }
  return {
    // The model's own doc id is only used when the caller has none
    docId: knownDocId || (fields.docId ?? ''),
    speakerId: fields.speakerId ?? '',
    construct: fields.construct,
    quote: fields.quote ?? '',
    confidence: parseConfidence(fields.confidence),
  };
}

/**
 * Parse a model reply into encoding instances.
 *
 * Never throws on malformed text: missing fields become empty strings, an unreadable
 * confidence becomes -1, and blocks without a construct are dropped.
 *
 * @param responseText - Raw text returned by the model.
 * @param knownDocId - Document id to stamp on every instance. Overrides the reply's DOC_ID.
 *
 * @example
 * ```ts
 * parseResponse('DOC_ID: x\nCONSTRUCT: Hope\nQUOTE: it gets better\nCONFIDENCE: 2', 'interview-01');
 * // [{ docId: 'interview-01', speakerId: '', construct: 'Hope', quote: 'it gets better', confidence: 2 }]
 * ```
 */
export function parseResponse(
  responseText: string,
  knownDocId = ''
): EncodingInstance[] {
  const instances: EncodingInstance[] = [];

  for (const block of splitBlocks(responseText)) {
    if (!block.trim()) continue;

    const instance = toInstance(parseBlock(block), knownDocId);
    if (instance) {
      instances.push(instance);
    }
  }

  return instances;
}
