export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

// Everything goes to stderr: stdout is reserved for terminal output.
function write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
  if (shouldLog(level)) process.stderr.write(formatMsg(level, msg, data) + "\n");
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    write("debug", msg, data);
  },
  info(msg: string, data?: Record<string, unknown>): void {
    write("info", msg, data);
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    write("warn", msg, data);
  },
  error(msg: string, data?: Record<string, unknown>): void {
    write("error", msg, data);
  },
};
