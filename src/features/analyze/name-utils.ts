/**
 * String helpers for names and report values.
 */

/**
 * Escape a value for embedding in a report string.
 *
 * Order matters: `\r` first, then `\n`, then `"`. A raw CRLF therefore
 * becomes the four characters `\r\n`. Existing backslashes are left as-is.
 */
export function escapeReportString(value: string): string {
  return value
    .replaceAll('\r', '\\r')
    .replaceAll('\n', '\\n')
    .replaceAll('"', '\\"');
}

/**
 * Return the part of `value` before `suffix`, or undefined when `value`
 * does not end with it.
 */
export function stripSuffix(value: string, suffix: string): string | undefined {
  if (!value.endsWith(suffix)) return undefined;
  return value.slice(0, value.length - suffix.length);
}

function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/** ASCII case-insensitive equality. Non-ASCII letters compare exactly. */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.length === b.length && asciiLower(a) === asciiLower(b);
}

/** ASCII case-insensitive substring check. */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return asciiLower(haystack).includes(asciiLower(needle));
}

/** Normalize path separators to `/`. */
export function toPosixPath(path: string): string {
  return path.replaceAll('\\', '/');
}

/** Last segment of a `/`-separated path ('' for a trailing slash). */
export function baseName(posixPath: string): string {
  const idx = posixPath.lastIndexOf('/');
  return idx < 0 ? posixPath : posixPath.slice(idx + 1);
}

/** Name of the directory directly containing `posixPath`. */
export function parentDirName(posixPath: string): string {
  const idx = posixPath.lastIndexOf('/');
  if (idx < 0) return '';
  return baseName(posixPath.slice(0, idx));
}
