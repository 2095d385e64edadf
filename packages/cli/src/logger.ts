export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  quiet?: boolean;
  prefix?: string;
}

/** Console logger; `quiet` drops informational lines but keeps warnings and errors */
export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? '[docmath]';

  return {
    info(message) {
      if (!options.quiet) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}
