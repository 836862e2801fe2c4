// apps/cli/src/constants.ts

/**
 * CLI Exit Codes
 *
 * 0 when the requested report or listing was produced, 1 otherwise.
 *
 * Usage:
 *   process.exit(EXIT_SUCCESS);
 *   process.exit(EXIT_ERROR);
 */
export const EXIT_SUCCESS = 0;

/** General error (config error, unwritable report or cache directory, etc.) */
export const EXIT_ERROR = 1;
