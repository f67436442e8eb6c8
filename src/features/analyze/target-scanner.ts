/**
 * Build-script scanning.
 *
 * Walks the files of an unpacked port once, and for every `.cmake` file under
 * the shared metadata tree collects the `add_library` targets it declares and
 * whether it is the config file of its directory.
 */

import type { ConfigBindings, ReadResult, TargetMap } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { BUILD_SCRIPT_EXTENSION, SHARED_DIR_MARKER } from './constants.js';
import { bindConfigFile } from './config-file-resolver.js';
import { baseName, containsIgnoreCase, parentDirName, toPosixPath } from './name-utils.js';

const log = createLogger('target-scanner');

/** `add_library(<target> ...`: first argument up to whitespace or `)`. */
const ADD_LIBRARY_RE = /\badd_library\(([^\s)]+)[\s)]/g;

export type TextReader = (path: string) => ReadResult;

export interface BuildMetadata {
  targets: TargetMap;
  configBindings: ConfigBindings;
}

/**
 * Whether a path is a build-script file inside the shared metadata tree.
 */
export function isBuildMetadataFile(path: string): boolean {
  const posixPath = toPosixPath(path);
  return containsIgnoreCase(posixPath, SHARED_DIR_MARKER) && posixPath.endsWith(BUILD_SCRIPT_EXTENSION);
}

/**
 * All `add_library` target names in a script, in text order.
 * Repeated declarations are kept.
 */
export function extractLibraryTargets(content: string): string[] {
  const targets: string[] = [];
  for (const match of content.matchAll(ADD_LIBRARY_RE)) {
    const target = match[1];
    if (target) targets.push(target);
  }
  return targets;
}

/**
 * Scan the files of one port.
 *
 * A directory gets a target entry only when one of its scripts declares at
 * least one target. Unreadable scripts contribute nothing.
 *
 * @param files - paths of every file in the port (any order; map keys are sorted later)
 */
export function scanBuildMetadata(files: readonly string[], readText: TextReader): BuildMetadata {
  const targets: TargetMap = new Map();
  const configBindings: ConfigBindings = new Map();

  for (const file of files) {
    if (!isBuildMetadataFile(file)) continue;

    const posixPath = toPosixPath(file);
    const directoryName = parentDirName(posixPath);

    const read = readText(file);
    if (read.ok) {
      const declared = extractLibraryTargets(read.content);
      if (declared.length > 0) {
        const existing = targets.get(directoryName);
        if (existing) {
          existing.push(...declared);
        } else {
          targets.set(directoryName, declared);
        }
      }
    } else {
      log.debug('Skipping unreadable build script', { file, reason: read.reason });
    }

    bindConfigFile(configBindings, baseName(posixPath), directoryName);
  }

  return { targets, configBindings };
}
