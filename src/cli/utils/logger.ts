/* eslint-disable no-console */
/**
 * CLI logging utility with colors.
 * Everything goes to stderr so stdout carries only the rendered step.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

let verbose = false;

export const logger = {
  setVerbose(enabled: boolean): void {
    verbose = enabled;
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (verbose || process.env.DEBUG) {
      console.error(`${DIM}🔍 ${message}${RESET}`);
    }
  },
};
