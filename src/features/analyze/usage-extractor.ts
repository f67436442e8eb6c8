/**
 * Usage note handling.
 *
 * A port may ship a free-text `usage` file under share/. Its content becomes
 * the usage string of every entry in the report. When no build script
 * declared any target, the note is also mined for `find_package` names.
 */

import type { TargetMap } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { SHARED_DIR_MARKER, USAGE_FILENAME } from './constants.js';
import { baseName, containsIgnoreCase, escapeReportString, toPosixPath } from './name-utils.js';
import type { TextReader } from './target-scanner.js';

const log = createLogger('usage-extractor');

const FIND_PACKAGE_RE = /\bfind_package\(([^\s)]+)[\s)]/g;

export interface UsageNote {
  /** File content as read; '' when there is no readable note */
  raw: string;
  /** `raw` escaped for the report */
  escaped: string;
}

const EMPTY_NOTE: UsageNote = { raw: '', escaped: '' };

/**
 * First file named exactly `usage` under the shared metadata tree.
 */
export function findUsageFile(files: readonly string[]): string | undefined {
  return files.find((file) => {
    const posixPath = toPosixPath(file);
    return baseName(posixPath) === USAGE_FILENAME && containsIgnoreCase(posixPath, SHARED_DIR_MARKER);
  });
}

/**
 * Read the port's usage note. Missing or unreadable notes yield empty strings.
 */
export function readUsageNote(files: readonly string[], readText: TextReader): UsageNote {
  const usageFile = findUsageFile(files);
  if (!usageFile) return EMPTY_NOTE;

  const read = readText(usageFile);
  if (!read.ok) {
    log.debug('Usage file not readable', { usageFile, reason: read.reason });
    return EMPTY_NOTE;
  }
  return { raw: read.content, escaped: escapeReportString(read.content) };
}

/**
 * `find_package` names mentioned in a text, first-seen order, each once.
 */
export function extractRequestedPackages(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(FIND_PACKAGE_RE)) {
    const name = match[1];
    if (name) names.add(name);
  }
  return [...names];
}

/**
 * Seed discovered names from the usage note when the scan found no targets.
 *
 * Returns `targets` itself when it already has entries; otherwise a new map
 * holding every requested package with an empty target list.
 */
export function applyUsageFallback(targets: TargetMap, usageText: string): TargetMap {
  if (targets.size > 0) return targets;

  const seeded: TargetMap = new Map();
  for (const name of extractRequestedPackages(usageText)) {
    seeded.set(name, []);
  }
  return seeded;
}
