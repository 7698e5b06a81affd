/**
 * Logging collaborator handed to traversal, processors and relayout.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug messages too; off by default */
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug: options.debug === true ? (message) => console.debug(message) : () => undefined,
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
