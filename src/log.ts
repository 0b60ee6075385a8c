// Everything goes to stderr: stdout belongs to the stdio transport.

const LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LEVELS)[number];

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
}

export function debug(...args: unknown[]): void {
  if (enabled("debug")) console.error("[debug]", ...args);
}

export function info(...args: unknown[]): void {
  if (enabled("info")) console.error(...args);
}

export function warn(...args: unknown[]): void {
  if (enabled("warn")) console.error("[warn]", ...args);
}

export function error(...args: unknown[]): void {
  console.error("[error]", ...args);
}
