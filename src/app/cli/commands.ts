/**
 * CLI subcommand definitions
 */

import { analyzeCommand } from '../../commands/analyze.js';
import { applyCliOverrides, loadAnalyzerConfig } from '../../infra/config/index.js';
import { warn } from '../../shared/ui/index.js';
import { program, baseConfig, resolvedCwd } from './program.js';

interface AnalyzeCliOptions {
  infile?: string;
  outfile?: string;
  unwrapped?: boolean;
  omitDescription?: boolean;
  dedupeTargets?: boolean;
}

program
  .command('analyze', { isDefault: true })
  .description('Analyze packaged ports and print CMake usage information as JSON')
  .argument('[archives...]', 'Port archives (.zip, .tar.gz, ...) or unpacked port directories')
  .option('--infile <file>', 'Read inputs from a file (one per line) instead of the command line')
  .option('--outfile <file>', 'Write the report to a file instead of stdout')
  .option('--unwrapped', 'Omit the enclosing { } around the report lines')
  .option('--omit-description', 'Omit the portDescription field')
  .option('--dedupe-targets', 'Drop repeated targets within one package')
  .action((archives: string[], opts: AnalyzeCliOptions) => {
    const config = applyCliOverrides(baseConfig ?? loadAnalyzerConfig(resolvedCwd), {
      unwrapped: opts.unwrapped,
      omitDescription: opts.omitDescription,
      dedupeTargets: opts.dedupeTargets,
    });

    const summary = analyzeCommand({
      inputs: archives,
      infile: opts.infile,
      outfile: opts.outfile,
      config,
    });
    if (summary.failed > 0) {
      warn(`${summary.failed} of ${summary.succeeded + summary.failed} input(s) skipped`);
    }
  });
