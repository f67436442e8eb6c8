/**
 * Merges manifest fields, scan results and the usage note into one
 * PackageRecord per port.
 */

import type {
  ConfigBindings,
  PackageEntry,
  PackageManifest,
  PackageRecord,
  TargetMap,
} from '../../core/models/index.js';
import { escapeReportString } from './name-utils.js';

export interface AssembleInput {
  manifest: PackageManifest;
  /** Scanner targets, or usage-seeded names when the scan found none */
  targets: TargetMap;
  configBindings: ConfigBindings;
  /** Escaped usage note; '' when the port has none */
  usage: string;
}

export interface AssembleOptions {
  /** Collapse repeated targets after sorting (default: keep them) */
  dedupeTargets?: boolean;
}

/**
 * Usage note generated for ports that ship none.
 *
 * Line breaks are written pre-escaped (`\r\n` as four characters) and the
 * embedded names are escaped, because the result goes into the report as-is.
 */
export function synthesizeUsage(portName: string, displayName: string, targets: readonly string[]): string {
  return (
    `The package ${escapeReportString(portName)} provides CMake targets:\\r\\n\\r\\n` +
    `    find_package(${escapeReportString(displayName)} CONFIG REQUIRED)\\r\\n` +
    `    target_link_libraries(main PRIVATE ${escapeReportString(targets.join(' '))})\\r\\n`
  );
}

function sortTargets(targets: readonly string[], dedupe: boolean): string[] {
  const sorted = [...targets].sort();
  return dedupe ? [...new Set(sorted)] : sorted;
}

/**
 * Targets grouped by display name, in sorted key order. Keys that resolve to
 * the same display name (`Foo/` and a `foo/` bound to `Foo`) share one group.
 */
function groupByDisplayName(targets: TargetMap, configBindings: ConfigBindings): Map<string, string[]> {
  const keys = [...new Set([...targets.keys(), ...configBindings.keys()])].sort();
  const groups = new Map<string, string[]>();
  for (const key of keys) {
    const displayName = configBindings.get(key) ?? key;
    const group = groups.get(displayName) ?? [];
    group.push(...(targets.get(key) ?? []));
    groups.set(displayName, group);
  }
  return groups;
}

/**
 * Build the record for one port.
 *
 * Names are the union of scanned and config-bound keys, in sorted order, one
 * entry per display name. When the port has no usage note, the first entry
 * supplies a synthesized one that every entry then shares.
 */
export function assemblePackageRecord(input: AssembleInput, options: AssembleOptions = {}): PackageRecord {
  const dedupe = options.dedupeTargets ?? false;
  const groups = groupByDisplayName(input.targets, input.configBindings);

  const entries: PackageEntry[] = [...groups].map(([displayName, targets]) => ({
    displayName,
    targets: sortTargets(targets, dedupe),
  }));

  let usage = input.usage;
  const first = entries[0];
  if (usage === '' && first) {
    usage = synthesizeUsage(input.manifest.name, first.displayName, first.targets);
  }

  return {
    portName: input.manifest.name,
    portDescription: input.manifest.description,
    usage,
    entries,
  };
}
