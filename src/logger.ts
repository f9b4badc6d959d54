/**
 * Logger interface for customizable logging.
 * Lets the host application route terminal diagnostics into its own
 * logging infrastructure.
 */
export interface Logger {
  /**
   * Log debug information for development troubleshooting.
   * Optional - if not provided, debug messages are silently dropped.
   */
  debug?(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const noop = () => {};

const defaultLogger: Logger = {
  debug: noop,
  warn: (msg, ...args) => console.warn(msg, ...args),
  error: (msg, ...args) => console.error(msg, ...args),
};

let currentLogger: Logger = defaultLogger;

export function getLogger(): Logger {
  return currentLogger;
}

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function resetLogger(): void {
  currentLogger = defaultLogger;
}

export function enableDebugLogging(): void {
  const current = currentLogger;
  currentLogger = {
    ...current,
    debug: (msg, ...args) => console.debug(msg, ...args),
  };
}

/**
 * Returns a logger that prefixes every message with `[tag]`.
 * When no logger is given, calls are resolved against the global logger at
 * call time, so a later `setLogger` still takes effect.
 */
export function createTaggedLogger(tag: string, logger?: Logger): Logger {
  const target = (): Logger => logger ?? currentLogger;
  const prefix = `[${tag}]`;

  return {
    debug: (msg, ...args) => target().debug?.(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => target().warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => target().error(`${prefix} ${msg}`, ...args),
  };
}
