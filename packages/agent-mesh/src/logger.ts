/**
 * Mesh logger
 *
 * Console logger with timestamp, level and a `prefix:child` scope.
 * Library components default to the silent logger; the CLI passes a console
 * logger (debug output only with --debug).
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  /** Enable debug output */
  debug?: boolean;
  /** Sink for debug/info lines (default: console.log) */
  log?: (line: string) => void;
  /** Sink for warn/error lines (default: same as log, else console.error) */
  logError?: (line: string) => void;
  /** Scope shown in brackets */
  prefix?: string;
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  isDebug: () => boolean;
  child: (prefix: string) => Logger;
}

const useColor = !!process.stdout.isTTY && !process.env.NO_COLOR;
const paint = (fn: (s: string) => string) => (s: string) => (useColor ? fn(s) : s);

const levelPaint: Record<LogLevel, (s: string) => string> = {
  debug: paint(pc.gray),
  info: paint(pc.cyan),
  warn: paint(pc.yellow),
  error: paint(pc.red),
};
const dim = paint(pc.dim);

/** HH:MM:SS.mmm */
function formatTimestamp(): string {
  const now = new Date();
  return now.toTimeString().slice(0, 8) + "." + now.getMilliseconds().toString().padStart(3, "0");
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (arg === null || arg === undefined) return String(arg);
  if (typeof arg === "object") {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function formatLine(level: LogLevel, prefix: string, message: string, args: unknown[]): string {
  const levelStr = levelPaint[level](level.toUpperCase().padEnd(5));
  const prefixStr = prefix ? `[${prefix}] ` : "";
  const argsStr = args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `${dim(formatTimestamp())} ${levelStr} ${prefixStr}${message}${argsStr}`;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const { debug: debugEnabled = false, prefix = "" } = config;
  const log = config.log ?? console.log;
  const logError = config.logError ?? (config.log ? config.log : console.error);

  return {
    debug: (message, ...args) => {
      if (debugEnabled) log(formatLine("debug", prefix, message, args));
    },
    info: (message, ...args) => log(formatLine("info", prefix, message, args)),
    warn: (message, ...args) => logError(formatLine("warn", prefix, message, args)),
    error: (message, ...args) => logError(formatLine("error", prefix, message, args)),
    isDebug: () => debugEnabled,
    child: (childPrefix) =>
      createLogger({
        ...config,
        prefix: prefix ? `${prefix}:${childPrefix}` : childPrefix,
      }),
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    isDebug: () => false,
    child: () => createSilentLogger(),
  };
}
