/**
 * Logger Utility
 * Scoped console logging; debug output is gated by a process-wide flag set from `--debug`
 */

let debugMode = false;

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Create a logger whose lines start with `[prefix]`
 *
 * `debug` goes to stdout only in debug mode, `info` always goes to stdout, and `warn`/`error`
 * go to stderr.
 */
export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (...args) => {
      if (debugMode) console.log(tag, ...args);
    },
    info: (...args) => console.log(tag, ...args),
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}
