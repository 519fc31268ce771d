let debugEnabled = false;

/** Turns debug lines on or off for every logger; set from PROCUREMENT_DEBUG at startup. */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export interface TaggedLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`, e.g.
 * `[ReservationManager][error] ...`. Debug lines only print after
 * `setDebugLogging(true)`.
 */
export function createLogger(tag: string): TaggedLogger {
  return {
    info(message, ...args) {
      console.log(`[${tag}]`, message, ...args);
    },
    warn(message, ...args) {
      console.warn(`[${tag}][warn]`, message, ...args);
    },
    debug(message, ...args) {
      if (debugEnabled) {
        console.debug(`[${tag}][debug]`, message, ...args);
      }
    },
    error(message, ...args) {
      console.error(`[${tag}][error]`, message, ...args);
    },
  };
}
