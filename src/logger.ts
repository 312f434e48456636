export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  magenta: (s: string) => `\x1b[35m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

function writeRaw(s: string) {
  process.stdout.write(s);
}

export class Logger {
  private static _verbose = false;
  private static _quiet = false;

  static setVerbose(v: boolean) { Logger._verbose = v; }

  /** Suppress info/telemetry output (used by --output-format json and by tests). */
  static setQuiet(q: boolean) { Logger._quiet = q; }

  static info(...args: unknown[]) {
    if (!Logger._quiet) console.log(...args);
  }

  static warn(...args: unknown[]) { console.warn(...args); }
  static error(...args: unknown[]) { console.error(...args); }

  /** Runtime events (worker lifecycle, turn transitions). Written to stderr so stdout stays clean. */
  static telemetry(...args: unknown[]) {
    if (Logger._quiet) return;
    if (Logger._verbose) console.error(C.gray("[telemetry]"), ...args);
  }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND SHUTTLE_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.SHUTTLE_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) console.error(...args);
  }

  static streamInfo(s: string) {
    if (!Logger._quiet) writeRaw(s);
  }

  static endStreamLine(suffix = "") {
    if (!Logger._quiet) writeRaw(suffix + "\n");
  }
}
