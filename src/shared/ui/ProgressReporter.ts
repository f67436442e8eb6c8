/**
 * Per-package progress lines for the analyze command.
 *
 * Each package gets `Processing <input>...` followed on the same line by
 * `done (...)` or `failed: <reason>`. Quiet mode drops everything except
 * failures, which are then printed on their own line with the input path.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type ProgressSink = (text: string) => void;

export interface ProgressReporterOptions {
  quiet: boolean;
  /** Override process.stderr.write for testing */
  writeFn?: ProgressSink;
  /** Disable ANSI colors (default: chalk's detection) */
  color?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export class ProgressReporter {
  private readonly quiet: boolean;
  private readonly writeFn: ProgressSink;
  private readonly paint: ChalkInstance;
  private currentInput: string | undefined;

  constructor(options: ProgressReporterOptions) {
    this.quiet = options.quiet;
    this.writeFn = options.writeFn ?? ((text: string) => process.stderr.write(text));
    this.paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
  }

  /** Informational line, suppressed in quiet mode */
  note(message: string): void {
    if (this.quiet) return;
    this.writeFn(`${message}\n`);
  }

  start(input: string): void {
    this.currentInput = input;
    if (this.quiet) return;
    this.writeFn(`Processing ${input}...`);
  }

  done(portName: string, nameCount: number, targetCount: number): void {
    this.currentInput = undefined;
    if (this.quiet) return;
    this.writeFn(
      this.paint.green(
        `done (port '${portName}' provides ${plural(nameCount, 'package')}, ${plural(targetCount, 'target')})`,
      ) + '\n',
    );
  }

  failed(reason: string): void {
    const input = this.currentInput;
    this.currentInput = undefined;
    if (this.quiet) {
      const prefix = input ? `${input}: ` : '';
      this.writeFn(this.paint.red(`failed: ${prefix}${reason}`) + '\n');
      return;
    }
    this.writeFn(this.paint.red(`failed: ${reason}`) + '\n');
  }
}
