/**
 * port-usage analyze — report the CMake packages and targets provided by
 * one or more packaged ports.
 *
 * Usage:
 *   port-usage analyze zlib_x64-linux.zip openssl_x64-linux.zip
 *   port-usage analyze --infile ports.txt --outfile usage.json
 */

import {
  closeSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  openSync,
  readFileSync,
  rmSync,
  statSync,
  writeSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import type { AnalyzerConfig, PackageRecord } from '../core/models/index.js';
import { analyzePackageDir, serializeReport } from '../features/analyze/index.js';
import {
  ArchiveExtractionError,
  SystemArchiveExtractor,
  archiveStem,
  type ArchiveExtractor,
} from '../infra/archive/extractor.js';
import { ProgressReporter } from '../shared/ui/index.js';
import {
  createLogger,
  getErrorMessage,
  PackageAnalysisError,
  SetupError,
} from '../shared/utils/index.js';

const log = createLogger('analyze');

export interface AnalyzeCommandOptions {
  /** Archive paths (or already-unpacked port directories) from the command line */
  inputs: readonly string[];
  /** File listing one input per line; replaces `inputs` when given */
  infile?: string;
  /** Report destination; stdout when omitted */
  outfile?: string;
  config: AnalyzerConfig;
  extractor?: ArchiveExtractor;
  reporter?: ProgressReporter;
  /** Override process.stdout.write for testing */
  writeStdout?: (text: string) => void;
}

export interface AnalyzeSummary {
  report: string;
  /** Inputs that produced a record */
  succeeded: number;
  /** Inputs that were skipped */
  failed: number;
}

/**
 * Inputs listed in a file, one per line. Lines are trimmed and blank lines
 * dropped.
 *
 * @throws SetupError when the file cannot be read
 */
export function readInputList(infile: string): string[] {
  const infilePath = resolve(infile);
  let content: string;
  try {
    content = readFileSync(infilePath, 'utf-8');
  } catch (err) {
    throw new SetupError(`Failed opening input file '${infilePath}': ${getErrorMessage(err)}`, { cause: err });
  }
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Directory holding the unpacked port for `input`.
 *
 * Directories are used in place. Archives are extracted to
 * `<workDir>/<stem>`; an existing extraction for the same stem is reused.
 */
export function resolvePackageRoot(input: string, workDir: string, extractor: ArchiveExtractor): string {
  const inputPath = resolve(input);
  if (!existsSync(inputPath)) {
    throw new PackageAnalysisError('input-not-found', `${inputPath} does not exist.`);
  }
  if (statSync(inputPath).isDirectory()) {
    return inputPath;
  }

  const destDir = join(workDir, archiveStem(inputPath));
  if (existsSync(destDir)) {
    log.debug('Reusing extraction', { inputPath, destDir });
    return destDir;
  }

  mkdirSync(destDir, { recursive: true });
  try {
    extractor.extract(inputPath, destDir);
  } catch (err) {
    rmSync(destDir, { recursive: true, force: true });
    if (err instanceof ArchiveExtractionError) {
      throw new PackageAnalysisError('extraction-failed', err.message, { cause: err });
    }
    throw err;
  }
  return destDir;
}

function createWorkDir(parent: string): string {
  try {
    return mkdtempSync(join(parent, 'port-usage-'));
  } catch (err) {
    throw new SetupError(`Failed creating temp directory in '${parent}': ${getErrorMessage(err)}`, { cause: err });
  }
}

function removeWorkDir(workDir: string): void {
  try {
    rmSync(workDir, { recursive: true, force: true });
  } catch (err) {
    throw new SetupError(`Failed removing temp directory '${workDir}': ${getErrorMessage(err)}`, { cause: err });
  }
}

/**
 * Run `fn` with a fresh working directory that is removed afterwards,
 * whether `fn` returns or throws. When `fn` throws, a cleanup failure is
 * logged and the original error propagates.
 */
export function withWorkDir<T>(
  parent: string,
  fn: (workDir: string) => T,
  remove: (workDir: string) => void = removeWorkDir,
): T {
  const workDir = createWorkDir(parent);
  let result: T;
  try {
    result = fn(workDir);
  } catch (err) {
    try {
      remove(workDir);
    } catch (cleanupErr) {
      log.error('Cleanup failed while handling an error', { workDir, error: getErrorMessage(cleanupErr) });
    }
    throw err;
  }
  remove(workDir);
  return result;
}

function openOutfile(outfile: string): { path: string; fd: number } {
  const path = resolve(outfile);
  try {
    return { path, fd: openSync(path, 'w') };
  } catch (err) {
    throw new SetupError(`Failed opening output file '${path}': ${getErrorMessage(err)}`, { cause: err });
  }
}

function writeReport(output: { path: string; fd: number }, report: string): void {
  try {
    writeSync(output.fd, report);
  } catch (err) {
    throw new SetupError(`Failed writing output file '${output.path}': ${getErrorMessage(err)}`, { cause: err });
  }
}

function analyzeInputs(
  inputs: readonly string[],
  workDir: string,
  options: AnalyzeCommandOptions,
  reporter: ProgressReporter,
): { records: PackageRecord[]; failed: number } {
  const extractor = options.extractor ?? new SystemArchiveExtractor();
  const records: PackageRecord[] = [];
  let failed = 0;

  for (const input of inputs) {
    reporter.start(input);
    try {
      const packageRoot = resolvePackageRoot(input, workDir, extractor);
      const analysis = analyzePackageDir(packageRoot, { dedupeTargets: options.config.dedupeTargets });
      records.push(analysis.record);
      reporter.done(analysis.record.portName, analysis.nameCount, analysis.targetCount);
    } catch (err) {
      if (!(err instanceof PackageAnalysisError)) throw err;
      failed++;
      log.error('Package skipped', { input, reason: err.reason, message: err.message });
      reporter.failed(err.message);
    }
  }

  return { records, failed };
}

/**
 * Analyze every input and emit one report.
 *
 * Per-package failures are reported and skipped. Only setup failures
 * (input list, output file, temp directory) throw.
 */
export function analyzeCommand(options: AnalyzeCommandOptions): AnalyzeSummary {
  const { config } = options;
  const reporter = options.reporter ?? new ProgressReporter({ quiet: config.quiet });

  const inputs = options.infile ? readInputList(options.infile) : [...options.inputs];
  if (options.infile) {
    reporter.note(`Input will be read from '${resolve(options.infile)}'.`);
  }

  const output = options.outfile ? openOutfile(options.outfile) : undefined;
  try {
    if (output) {
      reporter.note(`Output will be written to '${output.path}'.`);
    }

    const result = withWorkDir(config.tempDir ?? tmpdir(), (workDir) =>
      analyzeInputs(inputs, workDir, options, reporter),
    );

    const report = serializeReport(result.records, config.format);
    if (output) {
      writeReport(output, report);
    } else {
      const writeStdout = options.writeStdout ?? ((text: string) => process.stdout.write(text));
      writeStdout(report);
    }

    log.info('Analysis finished', { inputs: inputs.length, failed: result.failed });
    return { report, succeeded: result.records.length, failed: result.failed };
  } finally {
    if (output) closeSync(output.fd);
  }
}
