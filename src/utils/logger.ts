/** Structured context attached to a log line. */
export type LoggerMeta = Record<string, unknown>;

/**
 * Minimal logging contract used by the client and its middleware.
 * Any object with these four methods (pino, winston, console) fits.
 */
export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Logger writing to `console.debug`, `console.info`, `console.warn` and `console.error`.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta ?? {});
  }

  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta ?? {});
  }

  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta ?? {});
  }

  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta ?? {});
  }
}

/** Logger that discards everything. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
