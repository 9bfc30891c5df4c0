/**
 * Console logger passed through CLI and pipeline contexts.
 */

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type ConsoleLoggerOptions = {
  /** Emit debug lines */
  verbose?: boolean;
  prefix?: string;
};

/**
 * Logger writing to stderr so stdout stays free for command output
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? "[datatables]";
  return {
    debug: (msg: string) => {
      if (options.verbose) console.error(`${prefix} ${msg}`);
    },
    info: (msg: string) => console.error(`${prefix} ${msg}`),
    warn: (msg: string) => console.error(`${prefix} warn: ${msg}`),
    error: (msg: string) => console.error(`${prefix} error: ${msg}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
