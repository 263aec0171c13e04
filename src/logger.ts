// src/logger.ts

declare global {
  // Turns every history logger on, whatever each one was created with.
  // eslint-disable-next-line no-var
  var DEBUG_HISTORY: boolean | undefined;
}

export type Logger = (...args: unknown[]) => void;

function timeString(now: Date): string {
  return `${now.getHours()}:${now.getMinutes()}:${now.getSeconds()}.${now.getMilliseconds()}`;
}

/**
 * Creates a scoped debug logger. Output goes to the console with a timestamp
 * prefix, and only when `enabled()` or the global DEBUG_HISTORY flag is set.
 */
export function createLogger(scope: string, enabled: () => boolean = () => false): Logger {
  return (...args: unknown[]) => {
    if (!enabled() && !globalThis.DEBUG_HISTORY) return;
    console.log(`[${scope} ${timeString(new Date())}]`, ...args);
  };
}
