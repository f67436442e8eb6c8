/**
 * Debug logging for port-usage.
 *
 * Every scoped logger feeds one process-wide sink. Entries are appended to
 * the debug log file when debug is enabled, and echoed to stderr in verbose
 * runs.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';
import { getErrorMessage } from './error.js';

export type DebugLevel = 'DEBUG' | 'INFO' | 'ERROR';

export interface ScopedLogger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

export interface DebugLoggerOptions {
  config?: DebugConfig;
  /** Directory the default log path is resolved against */
  workDir?: string;
  /** Echo entries to stderr */
  verbose?: boolean;
}

function defaultLogFile(workDir: string): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return join(workDir, '.port-usage', 'logs', `debug-${stamp}.log`);
}

function logHeader(workDir: string | undefined): string {
  const rule = '='.repeat(60);
  return `${rule}\nport-usage debug log\nStarted: ${new Date().toISOString()}\nWorking directory: ${workDir ?? 'N/A'}\n${rule}\n`;
}

function serializeData(data: unknown): string {
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return '[Unable to serialize data]';
  }
}

export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private initialized = false;
  private logFile: string | null = null;
  private verbose = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    DebugLogger.instance ??= new DebugLogger();
    return DebugLogger.instance;
  }

  /** Drop the singleton (tests) */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  /**
   * Configure the sink. Only the first call takes effect. A log file is
   * opened when debug is enabled and either `logFile` or `workDir` is known.
   */
  init(options: DebugLoggerOptions = {}): void {
    if (this.initialized) return;
    this.initialized = true;
    this.verbose = options.verbose ?? false;

    const { config, workDir } = options;
    if (!config?.enabled) return;

    const logFile = config.logFile ?? (workDir ? defaultLogFile(workDir) : undefined);
    if (!logFile) return;

    mkdirSync(dirname(logFile), { recursive: true });
    writeFileSync(logFile, logHeader(workDir), 'utf-8');
    this.logFile = logFile;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  write(level: DebugLevel, component: string, message: string, data?: unknown): void {
    const timestamp = new Date().toISOString();
    const line = `[${level}] [${component}] ${message}`;

    if (this.verbose) {
      process.stderr.write(`[${timestamp.slice(11, 23)}] ${line}\n`);
    }
    if (!this.logFile) return;

    const body = data === undefined ? '' : `\n${serializeData(data)}`;
    try {
      appendFileSync(this.logFile, `[${timestamp}] ${line}${body}\n`, 'utf-8');
    } catch (err) {
      // Stop file logging; the run itself goes on
      this.logFile = null;
      process.stderr.write(`Debug log disabled: ${getErrorMessage(err)}\n`);
    }
  }
}

export function initDebugLogger(options?: DebugLoggerOptions): void {
  DebugLogger.getInstance().init(options);
}

/** Path of the active debug log, or null when file logging is off */
export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

export function createLogger(component: string): ScopedLogger {
  const sink = (level: DebugLevel) => (message: string, data?: unknown) =>
    DebugLogger.getInstance().write(level, component, message, data);
  return { debug: sink('DEBUG'), info: sink('INFO'), error: sink('ERROR') };
}
