/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook for initialization.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { resolve } from 'node:path';
import type { AnalyzerConfig } from '../../core/models/index.js';
import { applyCliOverrides, loadAnalyzerConfig } from '../../infra/config/index.js';
import { info, setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, getDebugLogFile } from '../../shared/utils/debug.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

/** Resolved cwd shared across commands via preAction hook */
export let resolvedCwd = '';

/** Configuration after file, env and global flags (set in preAction) */
export let baseConfig: AnalyzerConfig | undefined;

export { cliVersion };

export const program = new Command();

program
  .name('port-usage')
  .description('Report the CMake packages and targets provided by packaged ports')
  .version(cliVersion);

// --- Global options ---
program
  .option('-q, --quiet', 'Suppress progress messages')
  .option('-v, --verbose', 'Write debug log lines to stderr and the debug log file');

// Common initialization for all commands
program.hook('preAction', () => {
  resolvedCwd = resolve(process.cwd());

  const rootOpts = program.opts<{ quiet?: boolean; verbose?: boolean }>();
  const verbose = rootOpts.verbose === true;
  const config = applyCliOverrides(loadAnalyzerConfig(resolvedCwd), {
    quiet: rootOpts.quiet,
    verbose,
  });
  baseConfig = config;

  initDebugLogger({ config: config.debug, workDir: resolvedCwd, verbose });
  setLogLevel(config.logLevel);

  const debugLogFile = getDebugLogFile();
  if (debugLogFile) {
    info(`Debug log: ${debugLogFile}`);
  }

  log.info('port-usage starting', { version: cliVersion, cwd: resolvedCwd, verbose, quiet: config.quiet });
});
