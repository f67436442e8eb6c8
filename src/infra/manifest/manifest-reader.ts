/**
 * Reads the name and description of an unpacked port.
 *
 * CONTROL is preferred; vcpkg.json is used when CONTROL is absent.
 */

import { join } from 'node:path';
import type { PackageManifest } from '../../core/models/index.js';
import { JsonManifestSchema } from '../../core/models/index.js';
import { CONTROL_FILENAME, JSON_MANIFEST_FILENAME } from '../../features/analyze/constants.js';
import { escapeReportString } from '../../features/analyze/name-utils.js';
import { getErrorMessage } from '../../shared/utils/index.js';
import { readText } from '../fs/package-files.js';
import { parseParagraphs } from './paragraph-parser.js';

export type ManifestReadResult =
  | { ok: true; manifest: PackageManifest; path: string }
  | { ok: false; reason: 'not-found' | 'read-failed' | 'malformed'; message: string };

/**
 * Build a manifest from CONTROL text. The first paragraph is used: `Source`
 * names the port, falling back to `Package`.
 */
export function manifestFromControl(text: string, path: string): ManifestReadResult {
  const parsed = parseParagraphs(text);
  if (!parsed.ok) {
    return { ok: false, reason: 'malformed', message: `Error parsing ${path} (line ${parsed.line}): ${parsed.message}` };
  }

  const [first] = parsed.paragraphs;
  const name = first?.get('Source') ?? first?.get('Package');
  if (!first || !name) {
    return { ok: false, reason: 'malformed', message: `${path} has no Source or Package field` };
  }

  return {
    ok: true,
    path,
    manifest: {
      name,
      description: escapeReportString(first.get('Description') ?? ''),
    },
  };
}

/**
 * Build a manifest from vcpkg.json text. An array description is joined
 * with newlines.
 */
export function manifestFromJson(text: string, path: string): ManifestReadResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: 'malformed', message: `Error parsing ${path}: ${getErrorMessage(err)}` };
  }

  const result = JsonManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason: 'malformed', message: `Invalid ${path}: ${issues}` };
  }

  const { name, description } = result.data;
  const joined = Array.isArray(description) ? description.join('\n') : description ?? '';
  return {
    ok: true,
    path,
    manifest: { name, description: escapeReportString(joined) },
  };
}

/**
 * Read the manifest of the port unpacked at `packageRoot`.
 */
export function readPackageManifest(packageRoot: string): ManifestReadResult {
  const controlPath = join(packageRoot, CONTROL_FILENAME);
  const control = readText(controlPath);
  if (control.ok) {
    return manifestFromControl(control.content, controlPath);
  }
  if (control.reason === 'read-failed') {
    return { ok: false, reason: 'read-failed', message: control.message };
  }

  const jsonPath = join(packageRoot, JSON_MANIFEST_FILENAME);
  const json = readText(jsonPath);
  if (json.ok) {
    return manifestFromJson(json.content, jsonPath);
  }
  if (json.reason === 'read-failed') {
    return { ok: false, reason: 'read-failed', message: json.message };
  }

  return { ok: false, reason: 'not-found', message: `${controlPath} does not exist.` };
}
