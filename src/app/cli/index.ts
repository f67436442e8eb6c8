#!/usr/bin/env node

/**
 * port-usage CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { EXIT_GENERAL_ERROR, EXIT_SETUP_FAILED, EXIT_SUCCESS } from '../../exitCodes.js';
import { error } from '../../shared/ui/index.js';
import { SetupError, getErrorMessage } from '../../shared/utils/index.js';
import { program } from './program.js';
import './commands.js';

program
  .parseAsync()
  .then(() => {
    // Skipped packages are reported, not failures
    process.exitCode = EXIT_SUCCESS;
  })
  .catch((err: unknown) => {
    if (err instanceof SetupError) {
      error(err.message);
      process.exit(EXIT_SETUP_FAILED);
    }
    error(getErrorMessage(err));
    process.exit(EXIT_GENERAL_ERROR);
  });
