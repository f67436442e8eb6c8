export type {
  DebugConfig,
  ReportFormat,
  AnalyzerConfig,
  PackageManifest,
  TargetMap,
  ConfigBindings,
  PackageEntry,
  PackageRecord,
  ReadResult,
} from './types.js';

export * from './schemas.js';
