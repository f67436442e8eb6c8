/**
 * Archive extraction for packaged ports.
 *
 * Delegates to the system `unzip` / `tar` binaries, the same way packages
 * are unpacked elsewhere in the tool.
 */

import { execFileSync } from 'node:child_process';
import { basename } from 'node:path';
import { getErrorMessage } from '../../shared/utils/index.js';

export interface ArchiveExtractor {
  /** Materialize the archive's tree at `destDir`, or throw ArchiveExtractionError. */
  extract(archivePath: string, destDir: string): void;
}

export class ArchiveExtractionError extends Error {
  readonly archivePath: string;

  constructor(archivePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArchiveExtractionError';
    this.archivePath = archivePath;
  }
}

/** Recognized archive extensions, longest first. */
const TAR_EXTENSIONS = ['.tar.gz', '.tar.xz', '.tar.bz2', '.tgz', '.txz', '.tar'] as const;
const ZIP_EXTENSION = '.zip';

export interface ExtractCommand {
  file: string;
  args: string[];
}

function archiveExtension(archivePath: string): string | undefined {
  const lower = basename(archivePath).toLowerCase();
  if (lower.endsWith(ZIP_EXTENSION)) return ZIP_EXTENSION;
  return TAR_EXTENSIONS.find((ext) => lower.endsWith(ext));
}

/**
 * File name of the archive without its archive extension
 * (`zlib_x64-linux.tar.gz` → `zlib_x64-linux`).
 */
export function archiveStem(archivePath: string): string {
  const name = basename(archivePath);
  const ext = archiveExtension(archivePath);
  return ext ? name.slice(0, name.length - ext.length) : name;
}

/**
 * Command line that unpacks `archivePath` into `destDir`.
 *
 * @throws ArchiveExtractionError for unrecognized extensions
 */
export function buildExtractCommand(archivePath: string, destDir: string): ExtractCommand {
  const ext = archiveExtension(archivePath);
  if (ext === ZIP_EXTENSION) {
    return { file: 'unzip', args: ['-q', '-o', archivePath, '-d', destDir] };
  }
  if (ext) {
    return { file: 'tar', args: ['-xf', archivePath, '-C', destDir] };
  }
  throw new ArchiveExtractionError(archivePath, `Unsupported archive type: ${basename(archivePath)}`);
}

export type CommandRunner = (file: string, args: string[]) => void;

const runCommand: CommandRunner = (file, args) => {
  execFileSync(file, args, { stdio: 'pipe' });
};

/**
 * Extractor backed by the system unzip/tar binaries.
 */
export class SystemArchiveExtractor implements ArchiveExtractor {
  constructor(private readonly run: CommandRunner = runCommand) {}

  extract(archivePath: string, destDir: string): void {
    const { file, args } = buildExtractCommand(archivePath, destDir);
    try {
      this.run(file, args);
    } catch (err) {
      throw new ArchiveExtractionError(
        archivePath,
        `Failed extracting ${archivePath}: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
