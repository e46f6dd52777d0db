import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { extractOne } from '../../src/extraction/extractor.js';
import type { ExtractionRequest } from '../../src/types/extraction.js';
import type { LogSink } from '../../src/types/config.js';
import { buildMessage, makeTempDir, removeDir, writeMessageFile } from '../helpers/messages.js';

describe('extractOne', () => {
  let tmp: string;
  let out: string;

  const request = (sourcePath: string, overrides: Partial<ExtractionRequest> = {}): ExtractionRequest => ({
    sourcePath,
    outputRoot: out,
    createSubjectSubfolder: true,
    classifyByExtension: false,
    ...overrides,
  });

  const quarterly = (): Buffer => buildMessage({
    subject: 'Q4 Report',
    attachments: [{ filename: 'report.pdf', content: Buffer.from('%PDF-1.7 quarterly'), contentType: 'application/pdf' }],
  });

  beforeEach(() => {
    tmp = makeTempDir();
    out = path.join(tmp, 'out');
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('should write into a subject folder', () => {
    const source = writeMessageFile(tmp, 'q4.eml', quarterly());

    const result = extractOne(request(source));

    expect(result).toEqual({
      writtenPaths: [path.join(out, 'Q4 Report', 'report.pdf')],
      subject: 'Q4 Report',
    });
    expect(fs.readFileSync(result.writtenPaths[0], 'utf-8')).toBe('%PDF-1.7 quarterly');
  });

  it('should write into an extension folder', () => {
    const source = writeMessageFile(tmp, 'q4.eml', quarterly());

    const result = extractOne(request(source, { createSubjectSubfolder: false, classifyByExtension: true }));

    expect(result.writtenPaths).toEqual([path.join(out, 'pdf', 'report.pdf')]);
  });

  it('should combine subject and extension folders', () => {
    const source = writeMessageFile(tmp, 'q4.eml', buildMessage({
      subject: 'Q4 Report',
      attachments: [
        { filename: 'report.PDF', content: 'a' },
        { filename: 'README', content: 'b' },
      ],
    }));

    const result = extractOne(request(source, { classifyByExtension: true }));

    expect(result.writtenPaths).toEqual([
      path.join(out, 'Q4 Report', 'pdf', 'report.PDF'),
      path.join(out, 'Q4 Report', 'other', 'README'),
    ]);
  });

  it('should name the folder after the file when the subject is empty', () => {
    const source = writeMessageFile(tmp, 'msg001.eml', buildMessage({
      subject: '',
      attachments: [{ filename: 'a.txt', content: 'a' }],
    }));

    const result = extractOne(request(source));

    expect(result.writtenPaths).toEqual([path.join(out, 'msg001', 'a.txt')]);
    expect(result.subject).toBe('msg001');
  });

  it('should name the folder after the file when the subject is missing', () => {
    const source = writeMessageFile(tmp, 'msg002.eml', buildMessage({
      attachments: [{ filename: 'a.txt', content: 'a' }],
    }));

    expect(extractOne(request(source)).writtenPaths).toEqual([path.join(out, 'msg002', 'a.txt')]);
  });

  it('should sanitize subject and filename', () => {
    const source = writeMessageFile(tmp, 'x.eml', buildMessage({
      subject: 'Re: invoice 3/4?',
      attachments: [{ filename: 'a:b*c.txt', content: 'abc' }],
    }));

    const result = extractOne(request(source));

    expect(result.writtenPaths).toEqual([path.join(out, 'Re_ invoice 3_4_', 'a_b_c.txt')]);
  });

  it('should decode encoded subjects and filenames', () => {
    const source = writeMessageFile(tmp, 'x.eml', buildMessage({
      subject: '=?UTF-8?B?UmFwcG9ydCB0cmltZXN0cmllbA==?=',
      attachments: [{ filename: '=?UTF-8?B?5a2j5bqm5oql5ZGKLnBkZg==?=', content: 'x' }],
    }));

    const result = extractOne(request(source));

    expect(result.writtenPaths).toEqual([path.join(out, 'Rapport trimestriel', '季度报告.pdf')]);
  });

  it('should number attachments with the same name', () => {
    const source = writeMessageFile(tmp, 'dup.eml', buildMessage({
      subject: 'Scans',
      attachments: [
        { filename: 'scan.jpg', content: 'first' },
        { filename: 'scan.jpg', content: 'second' },
      ],
    }));

    const result = extractOne(request(source));

    expect(result.writtenPaths).toEqual([
      path.join(out, 'Scans', 'scan.jpg'),
      path.join(out, 'Scans', 'scan_1.jpg'),
    ]);
    expect(fs.readFileSync(result.writtenPaths[1], 'utf-8')).toBe('second');
  });

  it('should not overwrite output of an earlier run', () => {
    const source = writeMessageFile(tmp, 'q4.eml', quarterly());

    extractOne(request(source));
    const second = extractOne(request(source));

    expect(second.writtenPaths).toEqual([path.join(out, 'Q4 Report', 'report_1.pdf')]);
  });

  it('should keep binary payloads byte for byte', () => {
    const bytes = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
    const source = writeMessageFile(tmp, 'bin.eml', buildMessage({
      subject: 'Binary',
      attachments: [
        { filename: 'all.bin', content: bytes, encoding: 'base64' },
        { filename: 'raw.bin', content: bytes, encoding: '7bit' },
      ],
    }));

    const result = extractOne(request(source));

    expect(result.writtenPaths).toHaveLength(2);
    for (const written of result.writtenPaths) {
      expect(fs.readFileSync(written).equals(bytes)).toBe(true);
    }
  });

  it('should create the subject folder even without attachments', () => {
    const source = writeMessageFile(tmp, 'plain.eml', buildMessage({ subject: 'Just text' }));

    const result = extractOne(request(source));

    expect(result).toEqual({ writtenPaths: [], subject: 'Just text' });
    expect(fs.statSync(path.join(out, 'Just text')).isDirectory()).toBe(true);
  });

  it('should report a corrupt file without writing anything', () => {
    const source = writeMessageFile(tmp, 'corrupt.eml', Buffer.from([0x00, 0x9c, 0xff, 0x10, 0x0a]));

    const result = extractOne(request(source));

    expect(result).toEqual({
      writtenPaths: [],
      error: 'Message does not start with a header field',
      errorCode: 'PARSE_ERROR',
    });
    expect(fs.existsSync(out)).toBe(false);
  });

  it('should report a missing source file', () => {
    const missing = path.join(tmp, 'missing.eml');

    const result = extractOne(request(missing));

    expect(result.writtenPaths).toEqual([]);
    expect(result.errorCode).toBe('FILESYSTEM_ERROR');
    expect(result.error).toContain(`Failed to read ${missing}`);
  });

  it('should stop at a write failure and keep files already written', () => {
    const source = writeMessageFile(tmp, 'two.eml', buildMessage({
      subject: 'Two',
      attachments: [
        { filename: 'a.txt', content: 'a' },
        { filename: 'b.pdf', content: 'b' },
        { filename: 'c.txt', content: 'c' },
      ],
    }));
    // A file where the "pdf" folder should go makes the second attachment fail
    fs.mkdirSync(path.join(out, 'Two'), { recursive: true });
    fs.writeFileSync(path.join(out, 'Two', 'pdf'), 'blocker');
    const sink: LogSink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = extractOne(request(source, { classifyByExtension: true }), { logger: sink });

    expect(result.writtenPaths).toEqual([]);
    expect(result.errorCode).toBe('FILESYSTEM_ERROR');
    expect(fs.readFileSync(path.join(out, 'Two', 'txt', 'a.txt'), 'utf-8')).toBe('a');
    expect(fs.existsSync(path.join(out, 'Two', 'txt', 'c.txt'))).toBe(false);
    expect(sink.warn).toHaveBeenCalledTimes(1);
  });

  it('should apply naming options', () => {
    const source = writeMessageFile(tmp, 'x.eml', buildMessage({
      subject: '...',
      attachments: [{ filename: 'noext', content: 'x' }],
    }));

    const result = extractOne(
      request(source, { classifyByExtension: true }),
      { options: { placeholderName: 'unnamed', otherExtensionLabel: 'misc' } }
    );

    expect(result.writtenPaths).toEqual([path.join(out, 'unnamed', 'misc', 'noext')]);
  });

  it('should report unusable naming options as an input error', () => {
    const source = writeMessageFile(tmp, 'q4.eml', quarterly());

    const result = extractOne(request(source), { options: { replacementChar: '/' } });

    expect(result.writtenPaths).toEqual([]);
    expect(result.errorCode).toBe('INPUT_ERROR');
    expect(fs.existsSync(out)).toBe(false);
  });
});
