/**
 * Config file binding: decides whether a build-script file is the canonical
 * `<Name>Config.cmake` / `<name>-config.cmake` entry point for the
 * directory it sits in.
 */

import type { ConfigBindings } from '../../core/models/index.js';
import { CONFIG_FILE_SUFFIXES } from './constants.js';
import { equalsIgnoreCase, stripSuffix } from './name-utils.js';

/**
 * Resolve the display name a config file gives its directory.
 *
 * Only the first suffix the file name ends with is considered. The root left
 * after stripping it must match `directoryName` case-insensitively.
 *
 * @param fileName - base name of the build-script file
 * @param directoryName - name of the directory containing it
 * @returns the root in the file's own casing, or undefined when it does not bind
 */
export function resolveConfigName(fileName: string, directoryName: string): string | undefined {
  for (const suffix of CONFIG_FILE_SUFFIXES) {
    const root = stripSuffix(fileName, suffix);
    if (root === undefined) continue;
    return equalsIgnoreCase(root, directoryName) ? root : undefined;
  }
  return undefined;
}

/**
 * Record a binding for `directoryName` when `fileName` is its config file.
 * A later file for the same directory replaces an earlier binding.
 */
export function bindConfigFile(
  bindings: ConfigBindings,
  fileName: string,
  directoryName: string,
): void {
  const displayName = resolveConfigName(fileName, directoryName);
  if (displayName !== undefined) {
    bindings.set(directoryName, displayName);
  }
}
