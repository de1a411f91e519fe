import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatTableCsv, mergeTables, toTable, writeTable } from '../results.js';
import { RESULT_COLUMNS } from '../../types.js';
import { UnsupportedFormatError } from '../../library/errors.js';

const hope = {
  docId: 'd1',
  speakerId: 'P1',
  construct: 'Hope',
  quote: 'it gets better',
  confidence: 2,
};
const grit = {
  docId: 'd2',
  speakerId: 'P2',
  construct: 'Grit',
  quote: 'I said "again", and kept going',
  confidence: 3,
};

describe('toTable', () => {
  it('maps instances to snake_case rows in order', () => {
    const table = toTable([hope, grit]);
    expect(table.columns).toEqual(['doc_id', 'speaker_id', 'construct', 'quote', 'confidence']);
    expect(table.rows[0]).toEqual({
      doc_id: 'd1',
      speaker_id: 'P1',
      construct: 'Hope',
      quote: 'it gets better',
      confidence: 2,
    });
    expect(table.rows[1].construct).toBe('Grit');
  });

  it('gives an empty table with all columns', () => {
    expect(toTable([])).toEqual({ columns: RESULT_COLUMNS, rows: [] });
  });
});

describe('mergeTables', () => {
  it('concatenates rows in input order', () => {
    const merged = mergeTables([toTable([grit]), toTable([]), toTable([hope])]);
    expect(merged.rows.map((r) => r.doc_id)).toEqual(['d2', 'd1']);
  });

  it('gives an empty table for no input', () => {
    expect(mergeTables([])).toEqual(toTable([]));
  });
});

describe('formatTableCsv', () => {
  it('writes a header and escapes values', () => {
    expect(formatTableCsv(toTable([hope, grit]))).toBe(
      'doc_id,speaker_id,construct,quote,confidence\n' +
        'd1,P1,Hope,it gets better,2\n' +
        'd2,P2,Grit,"I said ""again"", and kept going",3\n'
    );
  });

  it('writes only the header for an empty table', () => {
    expect(formatTableCsv(toTable([]))).toBe('doc_id,speaker_id,construct,quote,confidence\n');
  });
});

describe('writeTable', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes CSV into a new directory', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'results-'));
    const target = path.join(dir, 'nested', 'out.csv');
    writeTable(toTable([hope]), target);
    expect(fs.readFileSync(target, 'utf-8')).toBe(
      'doc_id,speaker_id,construct,quote,confidence\nd1,P1,Hope,it gets better,2\n'
    );
  });

  it('writes JSON rows', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'results-'));
    const target = path.join(dir, 'out.json');
    writeTable(toTable([hope]), target);
    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual([
      { doc_id: 'd1', speaker_id: 'P1', construct: 'Hope', quote: 'it gets better', confidence: 2 },
    ]);
  });

  it('rejects other extensions', () => {
    expect(() => writeTable(toTable([]), 'out.xlsx')).toThrow(UnsupportedFormatError);
    expect(() => writeTable(toTable([]), 'out.xlsx')).toThrow(
      'Unsupported output format: .xlsx. Supported formats: .csv, .json'
    );
  });
});
