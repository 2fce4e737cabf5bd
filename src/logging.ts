/**
 * Console-backed logger handed to the engine through its context. Lines start
 * with a bracketed subsystem tag, followed by a context object:
 *
 *   logger.warn('[Ledger] Failed to record level', { playerId, level, error })
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function emit(write: (...args: unknown[]) => void, message: string, context?: LogContext): void {
  if (context) {
    write(message, context);
  } else {
    write(message);
  }
}

export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  return {
    debug(message, context) {
      if (options.debug) emit(console.debug, message, context);
    },
    info(message, context) {
      emit(console.log, message, context);
    },
    warn(message, context) {
      emit(console.warn, message, context);
    },
    error(message, context) {
      emit(console.error, message, context);
    },
  };
}

/** Flattens an unknown thrown value into something a log line can carry. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
