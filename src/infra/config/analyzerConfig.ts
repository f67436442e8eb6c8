/**
 * Analyzer configuration
 *
 * Sources, lowest precedence first: defaults, .port-usage/config.yaml in the
 * working directory, PORT_USAGE_* environment variables, CLI flags.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse } from 'yaml';
import { AnalyzerConfigSchema, type AnalyzerConfig } from '../../core/models/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { applyConfigEnvOverrides, isRecord } from './env/config-env-overrides.js';

const log = createLogger('config');

/** Per-run overrides taken from the command line */
export interface CliConfigOverrides {
  quiet?: boolean;
  verbose?: boolean;
  unwrapped?: boolean;
  omitDescription?: boolean;
  dedupeTargets?: boolean;
}

/** Project config directory (.port-usage in the working directory) */
export function getConfigDir(workDir: string): string {
  return join(resolve(workDir), '.port-usage');
}

/** Project config file path */
export function getConfigPath(workDir: string): string {
  return join(getConfigDir(workDir), 'config.yaml');
}

function readRawConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: unknown = parse(readFileSync(configPath, 'utf-8'));
    return isRecord(parsed) ? parsed : {};
  } catch (err) {
    log.debug('Config file not parsable, using defaults', { configPath, error: getErrorMessage(err) });
    return {};
  }
}

/**
 * Load configuration for a run started in `workDir`.
 *
 * @throws when the merged values do not match the config schema
 */
export function loadAnalyzerConfig(workDir: string, env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const configPath = getConfigPath(workDir);
  const raw = readRawConfig(configPath);
  applyConfigEnvOverrides(raw, env);

  const result = AnalyzerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration (${configPath}): ${issues}`);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.log_level,
    quiet: parsed.quiet,
    format: {
      wrapInObject: parsed.wrap_output,
      includeDescription: parsed.include_description,
    },
    dedupeTargets: parsed.dedupe_targets,
    tempDir: parsed.temp_dir,
    debug: parsed.debug
      ? { enabled: parsed.debug.enabled, logFile: parsed.debug.log_file }
      : undefined,
  };
}

/**
 * Layer CLI flags over loaded configuration. Flags that were not given leave
 * the configured value in place.
 */
export function applyCliOverrides(config: AnalyzerConfig, overrides: CliConfigOverrides): AnalyzerConfig {
  const verbose = overrides.verbose === true;
  return {
    ...config,
    logLevel: verbose ? 'debug' : config.logLevel,
    quiet: overrides.quiet === true || config.quiet,
    format: {
      wrapInObject: overrides.unwrapped === true ? false : config.format.wrapInObject,
      includeDescription: overrides.omitDescription === true ? false : config.format.includeDescription,
    },
    dedupeTargets: overrides.dedupeTargets === true || config.dedupeTargets,
    debug: verbose && !config.debug?.enabled ? { ...config.debug, enabled: true } : config.debug,
  };
}
