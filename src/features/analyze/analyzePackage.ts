/**
 * Analysis of one unpacked port directory.
 */

import { join } from 'node:path';
import type { PackageRecord } from '../../core/models/index.js';
import { listFilesRecursive, readText } from '../../infra/fs/package-files.js';
import { readPackageManifest } from '../../infra/manifest/manifest-reader.js';
import { createLogger, PackageAnalysisError, type PackageFailureReason } from '../../shared/utils/index.js';
import { assemblePackageRecord } from './assembler.js';
import { SHARED_DIR_NAME } from './constants.js';
import { scanBuildMetadata } from './target-scanner.js';
import { applyUsageFallback, readUsageNote } from './usage-extractor.js';

const log = createLogger('analyze-package');

export interface PackageAnalysis {
  record: PackageRecord;
  /** Number of report entries (discovered names) */
  nameCount: number;
  /** Targets across all entries */
  targetCount: number;
}

export interface AnalyzePackageOptions {
  dedupeTargets?: boolean;
}

const MANIFEST_FAILURES = {
  'not-found': 'manifest-not-found',
  'read-failed': 'manifest-unreadable',
  malformed: 'manifest-malformed',
} as const satisfies Record<string, PackageFailureReason>;

/**
 * Analyze the port unpacked at `packageRoot`.
 *
 * @throws PackageAnalysisError when the manifest is missing, unreadable or malformed
 */
export function analyzePackageDir(packageRoot: string, options: AnalyzePackageOptions = {}): PackageAnalysis {
  const manifestResult = readPackageManifest(packageRoot);
  if (!manifestResult.ok) {
    throw new PackageAnalysisError(MANIFEST_FAILURES[manifestResult.reason], manifestResult.message);
  }
  const { manifest } = manifestResult;

  const files = listFilesRecursive(join(packageRoot, SHARED_DIR_NAME));
  const { targets, configBindings } = scanBuildMetadata(files, readText);
  const usage = readUsageNote(files, readText);

  const record = assemblePackageRecord(
    {
      manifest,
      targets: applyUsageFallback(targets, usage.raw),
      configBindings,
      usage: usage.escaped,
    },
    { dedupeTargets: options.dedupeTargets },
  );

  const targetCount = record.entries.reduce((sum, entry) => sum + entry.targets.length, 0);
  log.debug('Package analyzed', {
    packageRoot,
    port: record.portName,
    names: record.entries.map((entry) => entry.displayName),
    targetCount,
  });

  return { record, nameCount: record.entries.length, targetCount };
}
