/**
 * Logger
 *
 * Lightweight logger interface for library modules.
 * Silent by default. Callers opt into logging by injecting a non-silent logger.
 */

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  /** If true (default), all output is suppressed. */
  silent?: boolean;
  /** Prepended to all messages (e.g., "[swapjump]"). */
  prefix?: string;
  /** Route `log` to stderr too, keeping stdout free for command output. */
  stderr?: boolean;
}

/** A logger that does nothing (default for all library code). */
const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger instance.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const { silent = true, prefix, stderr = false } = options || {};

  if (silent) {
    return silentLogger;
  }

  const formatArgs = (args: unknown[]): unknown[] => {
    if (prefix && args.length > 0 && typeof args[0] === "string") {
      return [`${prefix} ${args[0]}`, ...args.slice(1)];
    }
    if (prefix) {
      return [prefix, ...args];
    }
    return args;
  };

  return {
    log: (...args) =>
      stderr ? console.error(...formatArgs(args)) : console.log(...formatArgs(args)),
    warn: (...args) => console.warn(...formatArgs(args)),
    error: (...args) => console.error(...formatArgs(args)),
  };
}
