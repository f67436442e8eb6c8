/**
 * Tests for the control-file paragraph parser
 */

import { describe, it, expect } from 'vitest';
import { parseParagraphs } from '../infra/manifest/paragraph-parser.js';

describe('parseParagraphs', () => {
  it('should parse fields of a single paragraph', () => {
    const result = parseParagraphs('Source: zlib\nVersion: 1.2.13\nDescription: A compression library\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.paragraphs).toHaveLength(1);
    expect(result.paragraphs[0]?.get('Source')).toBe('zlib');
    expect(result.paragraphs[0]?.get('Description')).toBe('A compression library');
  });

  it('should join continuation lines with a newline', () => {
    const result = parseParagraphs('Source: x\nDescription: line one\n  line two\n\tline three\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.paragraphs[0]?.get('Description')).toBe('line one\nline two\nline three');
  });

  it('should split paragraphs on blank lines and skip comments', () => {
    const text = '# generated\nSource: curl\n\n\nFeature: ssl\nDescription: SSL support\n';

    const result = parseParagraphs(text);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.paragraphs).toHaveLength(2);
    expect(result.paragraphs[1]?.get('Feature')).toBe('ssl');
  });

  it('should accept CRLF line endings', () => {
    const result = parseParagraphs('Source: x\r\nVersion: 1\r\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.paragraphs[0]?.get('Version')).toBe('1');
  });

  it('should report a line without a field separator', () => {
    expect(parseParagraphs('Source: x\nnot a field\n')).toEqual({
      ok: false,
      line: 2,
      message: 'expected "Field: value", got "not a field"',
    });
  });

  it('should report a continuation line before any field', () => {
    expect(parseParagraphs('  indented\n')).toEqual({
      ok: false,
      line: 1,
      message: 'continuation line without a field',
    });
  });

  it('should report a duplicate field', () => {
    expect(parseParagraphs('Source: a\nSource: b\n')).toEqual({
      ok: false,
      line: 2,
      message: 'duplicate field "Source"',
    });
  });

  it('should report empty input', () => {
    expect(parseParagraphs('')).toEqual({ ok: false, line: 1, message: 'no paragraphs found' });
  });
});
