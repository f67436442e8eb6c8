/**
 * Tests for reading port manifests (CONTROL and vcpkg.json)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  readPackageManifest,
  manifestFromControl,
  manifestFromJson,
} from '../infra/manifest/manifest-reader.js';

describe('manifestFromControl', () => {
  it('should take the name from Source and escape the description', () => {
    const result = manifestFromControl('Source: zlib\nDescription: A "fast" library\n', 'CONTROL');

    expect(result).toEqual({
      ok: true,
      path: 'CONTROL',
      manifest: { name: 'zlib', description: 'A \\"fast\\" library' },
    });
  });

  it('should fall back to Package and default the description to empty', () => {
    const result = manifestFromControl('Package: foo\nVersion: 1.0\n', 'CONTROL');

    expect(result).toEqual({ ok: true, path: 'CONTROL', manifest: { name: 'foo', description: '' } });
  });

  it('should prefer Source over Package', () => {
    const result = manifestFromControl('Package: foo-bin\nSource: foo\n', 'CONTROL');

    expect(result.ok && result.manifest.name).toBe('foo');
  });

  it('should escape a multi-line description', () => {
    const result = manifestFromControl('Source: x\nDescription: first\n second\n', 'CONTROL');

    expect(result.ok && result.manifest.description).toBe('first\\nsecond');
  });

  it('should reject a paragraph without a name field', () => {
    const result = manifestFromControl('Version: 1.0\n', '/pkg/CONTROL');

    expect(result).toEqual({
      ok: false,
      reason: 'malformed',
      message: '/pkg/CONTROL has no Source or Package field',
    });
  });

  it('should reject unparsable text with the line number', () => {
    const result = manifestFromControl('Source: x\n???\n', '/pkg/CONTROL');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('malformed');
    expect(result.message).toBe('Error parsing /pkg/CONTROL (line 2): expected "Field: value", got "???"');
  });
});

describe('manifestFromJson', () => {
  it('should join an array description with newlines before escaping', () => {
    const text = JSON.stringify({ name: 'fmt', description: ['Formatting library', 'Second line'] });

    const result = manifestFromJson(text, 'vcpkg.json');

    expect(result).toEqual({
      ok: true,
      path: 'vcpkg.json',
      manifest: { name: 'fmt', description: 'Formatting library\\nSecond line' },
    });
  });

  it('should reject invalid JSON', () => {
    const result = manifestFromJson('{', 'vcpkg.json');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('malformed');
    expect(result.message.startsWith('Error parsing vcpkg.json: ')).toBe(true);
  });

  it('should reject a manifest without a name', () => {
    const result = manifestFromJson(JSON.stringify({ description: 'no name' }), 'vcpkg.json');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('malformed');
    expect(result.message.startsWith('Invalid vcpkg.json: name: ')).toBe(true);
  });
});

describe('readPackageManifest', () => {
  let packageRoot: string;

  beforeEach(() => {
    packageRoot = mkdtempSync(join(tmpdir(), 'port-usage-manifest-'));
  });

  afterEach(() => {
    rmSync(packageRoot, { recursive: true, force: true });
  });

  it('should read CONTROL at the package root', () => {
    writeFileSync(join(packageRoot, 'CONTROL'), 'Source: zlib\n');

    const result = readPackageManifest(packageRoot);

    expect(result).toEqual({
      ok: true,
      path: join(packageRoot, 'CONTROL'),
      manifest: { name: 'zlib', description: '' },
    });
  });

  it('should prefer CONTROL over vcpkg.json', () => {
    writeFileSync(join(packageRoot, 'CONTROL'), 'Source: from-control\n');
    writeFileSync(join(packageRoot, 'vcpkg.json'), JSON.stringify({ name: 'from-json' }));

    const result = readPackageManifest(packageRoot);

    expect(result.ok && result.manifest.name).toBe('from-control');
  });

  it('should use vcpkg.json when CONTROL is absent', () => {
    writeFileSync(join(packageRoot, 'vcpkg.json'), JSON.stringify({ name: 'fmt', description: 'Formatting' }));

    const result = readPackageManifest(packageRoot);

    expect(result.ok && result.manifest).toEqual({ name: 'fmt', description: 'Formatting' });
  });

  it('should report not-found when neither manifest exists', () => {
    const result = readPackageManifest(packageRoot);

    expect(result).toEqual({
      ok: false,
      reason: 'not-found',
      message: `${join(packageRoot, 'CONTROL')} does not exist.`,
    });
  });
});
