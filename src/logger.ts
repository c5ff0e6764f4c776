/**
 * Console logging for lsq.
 *
 * Server responses go to stdout through the console's own stream; everything
 * else goes through Logger, and debug output always lands on stderr.
 */

export const C = {
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  // Liquidsoap's own prompt color.
  boldYellow: (s: string) => `\x1b[01;33m${s}\x1b[00m`,
};

export class Logger {
  private static verbose = false;

  static setVerbose(v: boolean) { Logger.verbose = v; }

  static info(...args: unknown[]) { console.log(...args); }
  static warn(...args: unknown[]) { console.warn(...args); }
  static error(...args: unknown[]) { console.error(...args); }

  /** Printed only with --verbose AND LSQ_LOG_LEVEL=DEBUG. */
  static debug(...args: unknown[]) {
    if (!Logger.verbose) return;
    if ((process.env.LSQ_LOG_LEVEL ?? "").toUpperCase() !== "DEBUG") return;
    console.error(...args);
  }
}
