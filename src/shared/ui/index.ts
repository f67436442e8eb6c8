/**
 * UI utilities for terminal output — re-export hub.
 *
 * - LogManager.ts: Log level management and formatted output
 * - ProgressReporter.ts: Per-package progress lines
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  info,
  warn,
  error,
} from './LogManager.js';

export {
  ProgressReporter,
  type ProgressReporterOptions,
  type ProgressSink,
} from './ProgressReporter.js';
