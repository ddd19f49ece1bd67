export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Print debug lines */
  debug?: boolean;
  prefix?: string;
  /** Destination of debug and error lines; defaults to console.error */
  sink?: LogSink;
}

export interface Logger {
  readonly debugEnabled: boolean;
  debug(message: string): void;
  error(message: string): void;
}

/**
 * Create a prefixed logger. Debug lines are dropped unless enabled.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? '[proplogic]';
  const sink = options.sink ?? ((line: string) => console.error(line));
  const debugEnabled = options.debug === true;

  return {
    debugEnabled,
    debug(message: string): void {
      if (debugEnabled) {
        sink(`${prefix} ${message}`);
      }
    },
    error(message: string): void {
      sink(`${prefix} ${message}`);
    },
  };
}
