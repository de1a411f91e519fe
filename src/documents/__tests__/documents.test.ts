import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadDocumentFromText, loadDocuments, loadFile } from '../documents.js';
import {
  EmptyInputError,
  NoDocumentsError,
  NotFoundError,
  UnsupportedFormatError,
} from '../../library/errors.js';

describe('document loading', () => {
  let dir: string;

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'documents-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadFile', () => {
    it('loads a text transcript', async () => {
      const filePath = write('interview-01.txt', 'Interviewer: How are you?\nP1: Fine.');
      expect(await loadFile(filePath)).toEqual({
        id: 'interview-01',
        content: 'Interviewer: How are you?\nP1: Fine.',
        speakers: ['Interviewer', 'P1'],
        source: filePath,
      });
    });

    it('renders a speaker/text table as lines', async () => {
      const filePath = write('session.csv', 'speaker,text\nP2,hello there\nP1,"yes, indeed"\nP2,ok\n');
      const document = await loadFile(filePath);
      expect(document.id).toBe('session');
      expect(document.content).toBe('P2: hello there\nP1: yes, indeed\nP2: ok');
      expect(document.speakers).toEqual(['P2', 'P1']);
    });

    it('uses a text-only table without speakers', async () => {
      const filePath = write('notes.csv', 'utterance\nfirst line\nsecond line\n');
      const document = await loadFile(filePath);
      expect(document.content).toBe('first line\nsecond line');
      expect(document.speakers).toEqual([]);
    });

    it('keeps a table without known columns as raw text', async () => {
      const raw = 'alpha,beta\n1,2\n';
      const filePath = write('raw.csv', raw);
      const document = await loadFile(filePath);
      expect(document.content).toBe(raw);
    });

    it('fails on a table without a header line', async () => {
      const filePath = write('bad.csv', '\n\ntext\nhello\n');
      await expect(loadFile(filePath)).rejects.toBeInstanceOf(EmptyInputError);
      await expect(loadFile(filePath)).rejects.toThrow('CSV file appears to be empty');
    });

    it('rejects unsupported extensions', async () => {
      await expect(loadFile(path.join(dir, 'paper.pdf'))).rejects.toThrow(
        'Unsupported document format: .pdf. Supported formats: .txt, .csv'
      );
      await expect(loadFile(path.join(dir, 'paper.pdf'))).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });
  });

  describe('loadDocuments', () => {
    it('loads a single file as a one-element list', async () => {
      const filePath = write('solo.txt', 'hello');
      const documents = await loadDocuments(filePath);
      expect(documents.map((d) => d.id)).toEqual(['solo']);
    });

    it('loads supported files of a directory in name order', async () => {
      write('b.csv', 'speaker,text\nP1,hi\n');
      write('a.txt', 'P1: hello');
      write('readme.md', '# ignored');
      const documents = await loadDocuments(dir);
      expect(documents.map((d) => d.id)).toEqual(['a', 'b']);
    });

    it('ignores unsupported files next to a transcript', async () => {
      write('interview.txt', 'P1: hello');
      write('scan.pdf', '%PDF');
      const documents = await loadDocuments(dir);
      expect(documents.map((d) => d.id)).toEqual(['interview']);
    });

    it('skips files that fail to load and keeps their siblings', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      write('good.txt', 'P1: hello');
      const badPath = write('bad.csv', '\n\ntext\nhello\n');

      const documents = await loadDocuments(dir);

      expect(documents.map((d) => d.id)).toEqual(['good']);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toContain(badPath);
      expect(warn.mock.calls[0][0]).toContain('CSV file appears to be empty');
    });

    it('fails when a directory has only unsupported files', async () => {
      write('scan.pdf', '%PDF');
      await expect(loadDocuments(dir)).rejects.toBeInstanceOf(NoDocumentsError);
    });

    it('fails when a directory has no supported files', async () => {
      write('readme.md', '# ignored');
      await expect(loadDocuments(dir)).rejects.toBeInstanceOf(NoDocumentsError);
      await expect(loadDocuments(dir)).rejects.toThrow(
        `No valid documents found in directory: ${dir}. Supported formats: .txt, .csv`
      );
    });

    it('fails for a missing path', async () => {
      const missing = path.join(dir, 'missing');
      await expect(loadDocuments(missing)).rejects.toBeInstanceOf(NotFoundError);
      await expect(loadDocuments(missing)).rejects.toThrow(`Path not found: ${missing}`);
    });
  });

  describe('loadDocumentFromText', () => {
    it('defaults the id and source', () => {
      expect(loadDocumentFromText('Interviewer: hi')).toEqual({
        id: 'inline',
        content: 'Interviewer: hi',
        speakers: ['Interviewer'],
        source: '<string>',
      });
    });

    it('uses a given id', () => {
      expect(loadDocumentFromText('text', 'custom').id).toBe('custom');
    });

    it('rejects an empty id', () => {
      expect(() => loadDocumentFromText('text', '')).toThrow('Document id cannot be empty');
    });
  });
});
