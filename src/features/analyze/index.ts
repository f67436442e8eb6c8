/**
 * Port analysis - public API
 */

export { escapeReportString, stripSuffix, equalsIgnoreCase, containsIgnoreCase, toPosixPath } from './name-utils.js';
export { isBuildMetadataFile, extractLibraryTargets, scanBuildMetadata, type TextReader, type BuildMetadata } from './target-scanner.js';
export { resolveConfigName, bindConfigFile } from './config-file-resolver.js';
export { findUsageFile, readUsageNote, extractRequestedPackages, applyUsageFallback, type UsageNote } from './usage-extractor.js';
export { assemblePackageRecord, synthesizeUsage, type AssembleInput, type AssembleOptions } from './assembler.js';
export { serializeReport, renderRecordLines, DEFAULT_REPORT_FORMAT } from './report-serializer.js';
export { analyzePackageDir, type PackageAnalysis, type AnalyzePackageOptions } from './analyzePackage.js';
