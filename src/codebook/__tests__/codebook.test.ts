import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  formatCodebook,
  formatConstruct,
  loadCodebook,
  parseCodebookCsv,
  parseCodebookJson,
  parseCodebookText,
} from '../codebook.js';
import {
  CodebookFormatError,
  EmptyInputError,
  NotFoundError,
  UnsupportedFormatError,
} from '../../library/errors.js';

const hope = {
  name: 'Hope',
  definition: 'Expecting things to improve',
  examples: ['it will get better', 'I see a way forward'],
};

describe('parseCodebookJson', () => {
  it('reads the wrapped shape', () => {
    expect(
      parseCodebookJson({ constructs: [{ name: 'Grit', definition: 'Sustained effort' }] })
    ).toEqual([{ name: 'Grit', definition: 'Sustained effort', examples: [] }]);
  });

  it('reads the list shape', () => {
    expect(parseCodebookJson([hope])).toEqual([hope]);
  });

  it('reads the mapping shape in key order', () => {
    expect(
      parseCodebookJson({
        Hope: { definition: 'Expecting things to improve', examples: hope.examples },
        Grit: {},
      })
    ).toEqual([hope, { name: 'Grit', definition: '', examples: [] }]);
  });

  it('reports the offending field', () => {
    expect(() => parseCodebookJson([{ definition: 'no name' }])).toThrow(
      /JSON codebook format not recognized \(0\.name: /
    );
  });

  it('rejects scalars', () => {
    expect(() => parseCodebookJson(42)).toThrow(CodebookFormatError);
    expect(() => parseCodebookJson(42)).toThrow(
      /^JSON codebook format not recognized\. Supported formats:/
    );
  });
});

describe('parseCodebookCsv', () => {
  it('reads name, definition and examples columns', async () => {
    const csv =
      'Name,Definition,Examples\n' +
      'Hope,Expecting things to improve,it will get better; I see a way forward\n' +
      ',orphan row,\n' +
      'Grit,Sustained effort,\n';
    expect(await parseCodebookCsv(csv)).toEqual([
      hope,
      { name: 'Grit', definition: 'Sustained effort', examples: [] },
    ]);
  });

  it('accepts the alternative column names', async () => {
    const csv = 'construct,description,example\nGrit,Sustained effort,kept at it\n';
    expect(await parseCodebookCsv(csv)).toEqual([
      { name: 'Grit', definition: 'Sustained effort', examples: ['kept at it'] },
    ]);
  });

  it('fails on empty input', async () => {
    await expect(parseCodebookCsv('')).rejects.toBeInstanceOf(EmptyInputError);
  });
});

describe('parseCodebookText', () => {
  it('reads the tagged format', () => {
    const text = [
      'CONSTRUCT: Hope',
      'DEFINITION: Expecting things to improve',
      'EXAMPLES: it will get better; I see a way forward',
      '',
      'construct: Grit',
      'definition: Sustained effort',
    ].join('\n');
    expect(parseCodebookText(text)).toEqual([
      hope,
      { name: 'Grit', definition: 'Sustained effort', examples: [] },
    ]);
  });

  it('reads blank-line separated blocks', () => {
    const text = 'Hope\nExpecting things\nto improve\n\n\nGrit\n';
    expect(parseCodebookText(text)).toEqual([
      { name: 'Hope', definition: 'Expecting things to improve', examples: [] },
      { name: 'Grit', definition: '', examples: [] },
    ]);
  });
});

describe('loadCodebook', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'codebook-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads JSON and records the source', async () => {
    const filePath = path.join(dir, 'codebook.json');
    fs.writeFileSync(filePath, JSON.stringify({ constructs: [hope] }));
    expect(await loadCodebook(filePath)).toEqual({ constructs: [hope], source: filePath });
  });

  it('loads CSV and text files', async () => {
    const csvPath = path.join(dir, 'codebook.csv');
    const txtPath = path.join(dir, 'codebook.txt');
    fs.writeFileSync(csvPath, 'name,definition\nGrit,Sustained effort\n');
    fs.writeFileSync(txtPath, 'Grit\nSustained effort\n');
    expect((await loadCodebook(csvPath)).constructs).toEqual([
      { name: 'Grit', definition: 'Sustained effort', examples: [] },
    ]);
    expect((await loadCodebook(txtPath)).constructs).toEqual([
      { name: 'Grit', definition: 'Sustained effort', examples: [] },
    ]);
  });

  it('fails for a missing file', async () => {
    const missing = path.join(dir, 'missing.json');
    await expect(loadCodebook(missing)).rejects.toBeInstanceOf(NotFoundError);
    await expect(loadCodebook(missing)).rejects.toThrow(`Codebook file not found: ${missing}`);
  });

  it('fails for an unsupported extension', async () => {
    const filePath = path.join(dir, 'codebook.yaml');
    fs.writeFileSync(filePath, 'Hope: {}');
    await expect(loadCodebook(filePath)).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(loadCodebook(filePath)).rejects.toThrow(
      'Unsupported codebook format: .yaml. Supported formats: .json, .csv, .txt'
    );
  });

  it('fails for invalid JSON', async () => {
    const filePath = path.join(dir, 'codebook.json');
    fs.writeFileSync(filePath, '{ not json');
    await expect(loadCodebook(filePath)).rejects.toBeInstanceOf(CodebookFormatError);
  });
});

describe('formatConstruct', () => {
  it('lists examples when present', () => {
    expect(formatConstruct(hope)).toBe(
      'Construct: Hope\n' +
        'Definition: Expecting things to improve\n' +
        'Examples:\n' +
        '  - it will get better\n' +
        '  - I see a way forward'
    );
  });

  it('omits the examples section when empty', () => {
    expect(formatConstruct({ name: 'Grit', definition: 'Sustained effort', examples: [] })).toBe(
      'Construct: Grit\nDefinition: Sustained effort'
    );
  });
});

describe('formatCodebook', () => {
  it('separates constructs with a blank line', () => {
    expect(
      formatCodebook({
        constructs: [
          { name: 'A', definition: 'a', examples: [] },
          { name: 'B', definition: 'b', examples: [] },
        ],
      })
    ).toBe('Construct: A\nDefinition: a\n\nConstruct: B\nDefinition: b');
  });

  it('renders an empty codebook as empty text', () => {
    expect(formatCodebook({ constructs: [] })).toBe('');
  });
});
