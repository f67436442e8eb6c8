/**
 * Shared constants for port analysis.
 */

/** Manifest file at the root of an unpacked port. */
export const CONTROL_FILENAME = 'CONTROL';

/** JSON manifest, read when CONTROL is absent. */
export const JSON_MANIFEST_FILENAME = 'vcpkg.json';

/** Directory under the package root holding build-integration files. */
export const SHARED_DIR_NAME = 'share';

/** Path segment that marks a file as shared build metadata. */
export const SHARED_DIR_MARKER = `/${SHARED_DIR_NAME}/`;

/** Extension of build-script files that are scanned. */
export const BUILD_SCRIPT_EXTENSION = '.cmake';

/** Config file naming conventions, checked in this order. */
export const CONFIG_FILE_SUFFIXES = [
  `Config${BUILD_SCRIPT_EXTENSION}`,
  `-config${BUILD_SCRIPT_EXTENSION}`,
] as const;

/** Exact base name of the free-text usage note. */
export const USAGE_FILENAME = 'usage';
