const isTest = () => process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

/**
 * Console logging. Informational lines are muted under tests,
 * errors always go through.
 */
export const logger = {
  info(...args: unknown[]) {
    if (!isTest()) {
      console.log(...args);
    }
  },
  warn(...args: unknown[]) {
    if (!isTest()) {
      console.warn(...args);
    }
  },
  error(...args: unknown[]) {
    console.error(...args);
  },
};
