/**
 * Zod schemas for configuration and manifest validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

/** Log level schema */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** Debug config schema */
export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().optional(),
});

/** Analyzer config schema (.port-usage/config.yaml) */
export const AnalyzerConfigSchema = z.object({
  log_level: LogLevelSchema.optional().default('info'),
  /** Suppress per-package progress lines */
  quiet: z.boolean().optional().default(false),
  /** Wrap the report lines in an outer `{ ... }` */
  wrap_output: z.boolean().optional().default(true),
  /** Emit the portDescription field on every report line */
  include_description: z.boolean().optional().default(true),
  /** Drop repeated add_library matches from a target list */
  dedupe_targets: z.boolean().optional().default(false),
  /** Parent directory for the per-run extraction directory (defaults to the OS temp dir) */
  temp_dir: z.string().min(1).optional(),
  debug: DebugConfigSchema.optional(),
});

/** vcpkg.json manifest fields the analyzer reads */
export const JsonManifestSchema = z.object({
  name: z.string().min(1),
  description: z.union([z.string(), z.array(z.string())]).optional(),
});
