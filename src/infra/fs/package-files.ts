/**
 * Filesystem access for unpacked ports.
 */

import { readdirSync, readFileSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import type { ReadResult } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('package-files');

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function collectFiles(dir: string, files: string[]): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    log.debug('Failed to read directory', { dir, error: getErrorMessage(err) });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.isSymbolicLink()) continue;
    const absolutePath = join(dir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(absolutePath, files);
    } else if (entry.isFile()) {
      files.push(absolutePath);
    }
  }
}

/**
 * Every regular file below `dir`, depth-first with entries in name order.
 * Symbolic links are skipped. A missing directory yields an empty list.
 */
export function listFilesRecursive(dir: string): string[] {
  const files: string[] = [];
  collectFiles(dir, files);
  return files;
}

/**
 * Read a UTF-8 text file without throwing.
 */
export function readText(path: string): ReadResult {
  try {
    return { ok: true, content: readFileSync(path, 'utf-8') };
  } catch (err) {
    const reason = isNodeError(err) && err.code === 'ENOENT' ? 'not-found' : 'read-failed';
    return { ok: false, reason, message: getErrorMessage(err) };
  }
}
