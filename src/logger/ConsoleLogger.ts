import type { LoggerProvider, LogLevel } from "./LoggerProvider.js";

/**
 * Default logger of DataSpec. Writes `[dataspec]`-prefixed lines to the
 * console and drops messages below the current level. The CLI builds one
 * from `--log-level`.
 */
export class ConsoleLogger implements LoggerProvider {
  private levelOrder: Record<LogLevel, number> = {
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    silent: 5,
  };

  constructor(private currentLevel: LogLevel = "info") {}

  /**
   * @param level - Minimum level written from now on.
   */
  setLevel(level: LogLevel) {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelOrder[level] >= this.levelOrder[this.currentLevel];
  }

  debug(...args: unknown[]) {
    if (this.shouldLog("debug")) {
      console.debug("[dataspec][debug]", ...args);
    }
  }

  info(...args: unknown[]) {
    if (this.shouldLog("info")) {
      console.info("[dataspec]", ...args);
    }
  }

  warn(...args: unknown[]) {
    if (this.shouldLog("warn")) {
      console.warn("[dataspec][warn]", ...args);
    }
  }

  error(...args: unknown[]) {
    if (this.shouldLog("error")) {
      console.error("[dataspec][error]", ...args);
    }
  }
}
