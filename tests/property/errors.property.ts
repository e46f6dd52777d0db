/**
 * Property-based tests for error classes
 *
 * Property 5: Error Context Preservation
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  ExtractorError,
  MalformedMessageError,
  FileSystemError,
  InvalidRequestError,
  toFileSystemError
} from '../../src/types/errors.js';

describe('Property 5: Error Context Preservation', () => {
  it('MalformedMessageError keeps a bounded excerpt of the raw data', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), fc.string({ maxLength: 500 }), (message, rawData) => {
        const error = new MalformedMessageError(message, rawData);

        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(ExtractorError);
        expect(error.source).toBe('parse');
        expect(error.code).toBe('PARSE_ERROR');
        expect(error.name).toBe('MalformedMessageError');
        expect(error.message).toBe(message);
        expect(error.rawData).toBe(rawData.slice(0, 200));
      }),
      { numRuns: 100 }
    );
  });

  it('FileSystemError preserves path, operation and errno', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.string({ minLength: 1 }),
        fc.constantFrom('read' as const, 'mkdir' as const, 'write' as const),
        fc.constantFrom('EACCES', 'ENOSPC', 'ENOENT', 'EROFS'),
        (message, filePath, operation, errno) => {
          const cause = Object.assign(new Error('underlying'), { code: errno });
          const error = new FileSystemError(message, filePath, operation, cause);

          expect(error).toBeInstanceOf(ExtractorError);
          expect(error.source).toBe('filesystem');
          expect(error.code).toBe('FILESYSTEM_ERROR');
          expect(error.path).toBe(filePath);
          expect(error.operation).toBe(operation);
          expect(error.errno).toBe(errno);
          expect(error.cause).toBe(cause);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('toFileSystemError wraps any thrown value', () => {
    fc.assert(
      fc.property(
        fc.oneof(fc.string(), fc.integer(), fc.constant(undefined)),
        fc.string({ minLength: 1 }),
        (thrown, filePath) => {
          const error = toFileSystemError(thrown, filePath, 'write');

          expect(error).toBeInstanceOf(FileSystemError);
          expect(error.message).toBe(`Failed to write ${filePath}: ${String(thrown)}`);
          expect(error.errno).toBeUndefined();
          expect(toFileSystemError(error, 'elsewhere', 'read')).toBe(error);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('InvalidRequestError preserves its message', () => {
    fc.assert(
      fc.property(fc.string(), (message) => {
        const error = new InvalidRequestError(message);

        expect(error.source).toBe('input');
        expect(error.code).toBe('INPUT_ERROR');
        expect(error.message).toBe(message);
      }),
      { numRuns: 50 }
    );
  });
});
