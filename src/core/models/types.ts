/**
 * Domain and configuration types
 */

import type { LogLevel } from '../../shared/ui/index.js';

/** Debug configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Selects one of the report layouts */
export interface ReportFormat {
  /** Wrap all lines in an outer `{` / `}` */
  wrapInObject: boolean;
  /** Include the `portDescription` field */
  includeDescription: boolean;
}

/** Resolved analyzer configuration (file + env + CLI flags) */
export interface AnalyzerConfig {
  logLevel: LogLevel;
  quiet: boolean;
  format: ReportFormat;
  dedupeTargets: boolean;
  tempDir?: string;
  debug?: DebugConfig;
}

/** Fields read from a port's manifest. Immutable once read. */
export interface PackageManifest {
  readonly name: string;
  /** Already escaped for embedding in the report; empty when absent */
  readonly description: string;
}

/** find_package name → add_library targets, in discovery order */
export type TargetMap = Map<string, string[]>;

/** find_package name → display name taken from the config file name */
export type ConfigBindings = Map<string, string>;

/** One discovered name with its sorted targets */
export interface PackageEntry {
  readonly displayName: string;
  readonly targets: readonly string[];
}

/** Everything the report needs about one port */
export interface PackageRecord {
  readonly portName: string;
  readonly portDescription: string;
  /** Escaped usage note shared by every entry of the port */
  readonly usage: string;
  /** Ordered by discovered name */
  readonly entries: readonly PackageEntry[];
}

/** Outcome of reading a text file */
export type ReadResult =
  | { ok: true; content: string }
  | { ok: false; reason: 'not-found' | 'read-failed'; message: string };
