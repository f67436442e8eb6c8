/**
 * Parser for control-file paragraphs.
 *
 * Format:
 *   Field-Name: value
 *    continuation line (leading space or tab, joined with a newline)
 *   # comment
 *
 * Blank lines separate paragraphs.
 */

export type Paragraph = Map<string, string>;

export type ParagraphParseResult =
  | { ok: true; paragraphs: Paragraph[] }
  | { ok: false; line: number; message: string };

const FIELD_RE = /^([A-Za-z0-9-]+):(.*)$/;

/**
 * Parse control-file text into paragraphs of field → value.
 *
 * @returns the paragraphs, or the 1-based line of the first problem
 */
export function parseParagraphs(text: string): ParagraphParseResult {
  const lines = text.split(/\r?\n/);
  const paragraphs: Paragraph[] = [];
  let current: Paragraph = new Map();
  let lastField: string | undefined;

  for (const [i, line] of lines.entries()) {
    const lineNo = i + 1;

    if (line.trim() === '') {
      if (current.size > 0) {
        paragraphs.push(current);
        current = new Map();
      }
      lastField = undefined;
      continue;
    }

    if (line.startsWith('#')) continue;

    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (lastField === undefined) {
        return { ok: false, line: lineNo, message: 'continuation line without a field' };
      }
      current.set(lastField, `${current.get(lastField) ?? ''}\n${line.trim()}`);
      continue;
    }

    const match = FIELD_RE.exec(line);
    const field = match?.[1];
    if (!match || !field) {
      return { ok: false, line: lineNo, message: `expected "Field: value", got "${line}"` };
    }
    if (current.has(field)) {
      return { ok: false, line: lineNo, message: `duplicate field "${field}"` };
    }
    current.set(field, (match[2] ?? '').trim());
    lastField = field;
  }

  if (current.size > 0) {
    paragraphs.push(current);
  }

  if (paragraphs.length === 0) {
    return { ok: false, line: lines.length, message: 'no paragraphs found' };
  }

  return { ok: true, paragraphs };
}
