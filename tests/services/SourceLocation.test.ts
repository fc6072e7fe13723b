/**
 * @file SourceLocation.test.ts - Unit tests for backward-search payload validation
 * @depends SourceLocation, errors
 */

import { describe, expect, it } from 'vitest';
import { NotificationParseError } from '../../src/services/errors';
import { formatSourceLocation, parseSourceLocation } from '../../src/services/SourceLocation';

describe('parseSourceLocation', () => {
  it('accepts a file and a positive line', () => {
    expect(parseSourceLocation({ file: '/work/paper.tex', line: 12, column: undefined })).toEqual({
      file: '/work/paper.tex',
      line: 12,
    });
  });

  it('keeps a positive column', () => {
    expect(parseSourceLocation({ file: '/a.tex', line: 1, column: 8 })).toEqual({
      file: '/a.tex',
      line: 1,
      column: 8,
    });
  });

  it('rejects line 0', () => {
    expect(() => parseSourceLocation({ file: '/a.tex', line: 0, column: undefined })).toThrow(
      'Malformed backward-search notification (line: line must be 1 or greater)'
    );
  });

  it('rejects an empty file', () => {
    expect(() => parseSourceLocation({ file: '', line: 3, column: undefined })).toThrow(
      'Malformed backward-search notification (file: source file path is empty)'
    );
  });

  it('rejects a non-numeric line', () => {
    expect(() => parseSourceLocation({ file: '/a.tex', line: '12', column: undefined })).toThrow(
      NotificationParseError
    );
  });

  it('keeps the raw payload on the error', () => {
    const payload = { file: '/a.tex', line: -4, column: undefined };
    try {
      parseSourceLocation(payload);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotificationParseError);
      if (error instanceof NotificationParseError) {
        expect(error.payload).toBe(payload);
      }
    }
  });
});

describe('formatSourceLocation', () => {
  it('renders file:line and file:line:column', () => {
    expect(formatSourceLocation({ file: '/a.tex', line: 3 })).toBe('/a.tex:3');
    expect(formatSourceLocation({ file: '/a.tex', line: 3, column: 4 })).toBe('/a.tex:3:4');
  });
});
