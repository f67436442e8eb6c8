/**
 * Renders package records as the JSON-shaped usage report.
 *
 * Each line is a `"name": { ... }` member. Names, targets and the port name
 * are escaped here; description and usage arrive escaped from the reader.
 */

import type { PackageEntry, PackageRecord, ReportFormat } from '../../core/models/index.js';
import { escapeReportString } from './name-utils.js';

export const DEFAULT_REPORT_FORMAT: ReportFormat = {
  wrapInObject: true,
  includeDescription: true,
};

const INDENT = '    ';
const LINE_SEPARATOR = ',\n';

function renderTargets(targets: readonly string[]): string {
  return targets.length === 0 ? '[]' : `["${targets.map(escapeReportString).join('", "')}"]`;
}

function renderLine(record: PackageRecord, entry: PackageEntry, format: ReportFormat): string {
  const name = escapeReportString(entry.displayName);
  const fields = [
    `"name": "${name}"`,
    `"targets": ${renderTargets(entry.targets)}`,
    `"portName": "${escapeReportString(record.portName)}"`,
  ];
  if (format.includeDescription) {
    fields.push(`"portDescription": "${record.portDescription}"`);
  }
  fields.push(`"description": "${record.usage}"`);

  return `${INDENT}"${name}": { ${fields.join(', ')} }`;
}

/**
 * Report lines for one record. A record without entries still gets one
 * line, keyed `_<portName>` with no targets.
 */
export function renderRecordLines(record: PackageRecord, format: ReportFormat = DEFAULT_REPORT_FORMAT): string[] {
  if (record.entries.length === 0) {
    return [renderLine(record, { displayName: `_${record.portName}`, targets: [] }, format)];
  }
  return record.entries.map((entry) => renderLine(record, entry, format));
}

/**
 * Full report for all records, in the given order.
 */
export function serializeReport(
  records: readonly PackageRecord[],
  format: ReportFormat = DEFAULT_REPORT_FORMAT,
): string {
  const body = records.flatMap((record) => renderRecordLines(record, format)).join(LINE_SEPARATOR);
  if (format.wrapInObject) {
    return `{\n${body}\n}\n`;
  }
  return body === '' ? '' : `${body}\n`;
}
