import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';
import { createProgram, parseInteger, parseTemperature } from '../program.js';

describe('option parsers', () => {
  it('parses positive integers', () => {
    expect(parseInteger('2048')).toBe(2048);
    expect(() => parseInteger('0')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('1.5')).toThrow('Must be a positive integer.');
  });

  it('parses temperatures between 0 and 2', () => {
    expect(parseTemperature('0')).toBe(0);
    expect(parseTemperature('0.7')).toBe(0.7);
    expect(() => parseTemperature('3')).toThrow('Must be a number between 0 and 2.');
    expect(() => parseTemperature('warm')).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints a prompt preview', async () => {
    const documentPath = path.join(dir, 'int-1.txt');
    const codebookPath = path.join(dir, 'codebook.txt');
    const templatePath = path.join(dir, 'template.txt');
    fs.writeFileSync(documentPath, 'P1: hello');
    fs.writeFileSync(codebookPath, 'Hope\nExpecting things to improve\n');
    fs.writeFileSync(templatePath, '{doc_id}/{speakers}\n{text}\n{codebook}');

    await createProgram().parseAsync([
      'node',
      'construct-encoder',
      'preview',
      documentPath,
      '-c',
      codebookPath,
      '--prompt-template',
      templatePath,
    ]);

    expect(log).toHaveBeenCalledWith(
      'int-1/P1\nP1: hello\nConstruct: Hope\nDefinition: Expecting things to improve'
    );
  });

  it('lists models', async () => {
    await createProgram().parseAsync(['node', 'construct-encoder', 'models']);
    expect(log).toHaveBeenCalledTimes(9);
  });
});
