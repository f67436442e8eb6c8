/**
 * Tests for usage note extraction and find_package fallback
 */

import { describe, it, expect } from 'vitest';
import {
  findUsageFile,
  readUsageNote,
  extractRequestedPackages,
  applyUsageFallback,
} from '../features/analyze/usage-extractor.js';
import type { TextReader } from '../features/analyze/target-scanner.js';

function readerFrom(contents: Record<string, string>): TextReader {
  return (path) => {
    const content = contents[path];
    return content === undefined
      ? { ok: false, reason: 'not-found', message: `missing ${path}` }
      : { ok: true, content };
  };
}

describe('findUsageFile', () => {
  it('should find a file named exactly usage under share/', () => {
    const files = ['/pkg/share/zlib/zlibConfig.cmake', '/pkg/share/zlib/usage'];
    expect(findUsageFile(files)).toBe('/pkg/share/zlib/usage');
  });

  it('should return the first match in listing order', () => {
    const files = ['/pkg/share/a/usage', '/pkg/share/b/usage'];
    expect(findUsageFile(files)).toBe('/pkg/share/a/usage');
  });

  it('should ignore similarly named files and files outside share/', () => {
    expect(findUsageFile(['/pkg/share/zlib/usage.txt', '/pkg/docs/usage'])).toBeUndefined();
  });
});

describe('readUsageNote', () => {
  it('should keep the raw note and an escaped copy', () => {
    const files = ['/pkg/share/zlib/usage'];
    const reader = readerFrom({
      '/pkg/share/zlib/usage': 'Use:\r\n  find_package(ZLIB REQUIRED)\n"quoted"',
    });

    const note = readUsageNote(files, reader);

    expect(note.raw).toBe('Use:\r\n  find_package(ZLIB REQUIRED)\n"quoted"');
    expect(note.escaped).toBe('Use:\\r\\n  find_package(ZLIB REQUIRED)\\n\\"quoted\\"');
  });

  it('should return empty strings when there is no usage file', () => {
    expect(readUsageNote(['/pkg/share/zlib/zlibConfig.cmake'], readerFrom({}))).toEqual({ raw: '', escaped: '' });
  });

  it('should return empty strings when the usage file cannot be read', () => {
    expect(readUsageNote(['/pkg/share/zlib/usage'], readerFrom({}))).toEqual({ raw: '', escaped: '' });
  });
});

describe('extractRequestedPackages', () => {
  it('should list each requested package once, in first-seen order', () => {
    const text = [
      'find_package(Zlib REQUIRED)',
      'find_package(OpenSSL)',
      'find_package(Zlib CONFIG)',
    ].join('\n');

    expect(extractRequestedPackages(text)).toEqual(['Zlib', 'OpenSSL']);
  });

  it('should return an empty list when nothing is requested', () => {
    expect(extractRequestedPackages('This port provides headers only.')).toEqual([]);
  });
});

describe('applyUsageFallback', () => {
  it('should seed names with empty target lists when the scan found nothing', () => {
    // Given: no scanned targets and a note requesting two packages
    const text = 'find_package(Zlib REQUIRED)\nfind_package(OpenSSL)\n';

    // When: fallback applied
    const seeded = applyUsageFallback(new Map(), text);

    // Then: both names, in first-seen order, without targets
    expect([...seeded.entries()]).toEqual([
      ['Zlib', []],
      ['OpenSSL', []],
    ]);
  });

  it('should return scanned targets untouched when there are any', () => {
    const targets = new Map([['zlib', ['ZLIB::ZLIB']]]);

    const result = applyUsageFallback(targets, 'find_package(Other REQUIRED)');

    expect(result).toBe(targets);
    expect([...result.keys()]).toEqual(['zlib']);
  });
});
