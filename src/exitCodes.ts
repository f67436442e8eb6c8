/**
 * Process exit codes for port-usage
 *
 * Skipped packages do not change the exit code; only failures that stop
 * the whole run do.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_SETUP_FAILED = 2;
