export const LOG_PREFIX = "[fluent-rest]";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Console-backed logger. Debug lines are dropped unless `debug` is set.
 */
export function createConsoleLogger(debug = false): Logger {
  return {
    debug(message: string, ...args: unknown[]): void {
      if (debug) {
        console.debug(`${LOG_PREFIX} ${message}`, ...args);
      }
    },
    warn(message: string, ...args: unknown[]): void {
      console.warn(`${LOG_PREFIX} ${message}`, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};
