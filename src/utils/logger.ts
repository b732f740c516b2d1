/**
 * Console logger for the server
 * Errors always print; the rest stays quiet under the test runner
 */

const IS_DEV = process.env.NODE_ENV === 'development';
const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const logger = {
  /**
   * General information (skipped in tests)
   */
  log: (...args: unknown[]) => {
    if (!IS_TEST) console.log(...args);
  },

  /**
   * Errors (always logged)
   * Never pass card details or secrets here
   */
  error: (...args: unknown[]) => {
    console.error(...args);
  },

  warn: (...args: unknown[]) => {
    if (!IS_TEST) console.warn(...args);
  },

  /**
   * Debug output (development only)
   */
  debug: (...args: unknown[]) => {
    if (IS_DEV) console.debug(...args);
  },
};
