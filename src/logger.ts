import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levelRank, value);
}

/** Niveau valide ou repli (valeur inconnue → `fallback`). */
export function parseLogLevel(value: unknown, fallback: LogLevel = "info"): LogLevel {
  const v = typeof value === "string" ? value.trim().toLowerCase() : value;
  return isLogLevel(v) ? v : fallback;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelRank[level] <= levelRank[currentLevel];
}

type Sink = "log" | "warn" | "error";

/** Couleur et sortie console par niveau. */
const levelOutput: Record<LogLevel, { paint: (s: string) => string; sink: Sink }> = {
  error: { paint: chalk.red.bold, sink: "error" },
  warn: { paint: chalk.yellow, sink: "warn" },
  info: { paint: chalk.cyan, sink: "log" },
  debug: { paint: chalk.gray, sink: "log" },
  trace: { paint: chalk.magenta, sink: "log" },
};

/** Ligne horodatée: `[ISO] [LEVEL] message args...`. */
export function formatLine(level: LogLevel, message: unknown, args: readonly unknown[] = [], now: Date = new Date()): string {
  const text = [message, ...args].map((v) => (v instanceof Error ? v.stack ?? v.message : String(v))).join(" ");
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${text}`;
}

function emit(level: LogLevel, message: unknown, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const { paint, sink } = levelOutput[level];
  console[sink](paint(formatLine(level, message, args)));
}

export const logger = {
  error: (message: unknown, ...args: unknown[]): void => emit("error", message, args),
  warn: (message: unknown, ...args: unknown[]): void => emit("warn", message, args),
  info: (message: unknown, ...args: unknown[]): void => emit("info", message, args),
  debug: (message: unknown, ...args: unknown[]): void => emit("debug", message, args),
  trace: (message: unknown, ...args: unknown[]): void => emit("trace", message, args),
};
