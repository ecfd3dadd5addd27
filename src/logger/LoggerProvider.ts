/**
 * Verbosity levels, quietest last. `silent` turns logging off.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Sink for the facade's diagnostics: schema loads and cache hits at debug,
 * depth-limit stops at warn. Pass one as `logger` to defineDataSpec to route
 * them elsewhere than the console.
 */
export interface LoggerProvider {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
