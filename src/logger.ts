import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  const env = (raw ?? "info").toLowerCase();
  if (env === "debug" || env === "info" || env === "warn" || env === "error") return env;
  return "info";
}

let globalLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
let logFile: string | undefined;

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/** Mirror every emitted line, uncolored, to `path`. Pass `undefined` to stop. */
export function setLogFile(path: string | undefined): void {
  logFile = path;
}

// ANSI color codes
const c = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

export { c as colors };

const levelColors: Record<LogLevel, string> = {
  debug: c.gray,
  info: c.cyan,
  warn: c.yellow,
  error: c.red,
};

function fmt(scope: string, level: LogLevel, msg: string, ts: string) {
  const lc = levelColors[level];
  return `${c.dim}${ts}${c.reset} ${lc}${level.toUpperCase().padEnd(5)}${c.reset} ${c.magenta}${scope}${c.reset} ${msg}`;
}

function plain(scope: string, level: LogLevel, msg: string, ts: string) {
  return `${ts} ${level.toUpperCase().padEnd(5)} ${scope} ${msg}\n`;
}

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function createLogger(scope: string): Logger {
  const should = (level: LogLevel) => levelOrder[level] >= levelOrder[globalLevel];
  const emit = (level: LogLevel, msg: string, write: (line: string) => void) => {
    if (!should(level)) return;
    const ts = new Date().toISOString();
    write(fmt(scope, level, msg, ts));
    if (logFile) appendFileSync(logFile, plain(scope, level, msg, ts));
  };

  return {
    debug: (msg: string) => emit("debug", msg, (line) => console.debug(line)),
    info: (msg: string) => emit("info", msg, (line) => console.log(line)),
    warn: (msg: string) => emit("warn", msg, (line) => console.warn(line)),
    error: (msg: string) => emit("error", msg, (line) => console.error(line)),
  };
}

// Operator-facing status lines, outside the levelled log
export function printRed(msg: string): void {
  console.error(`${c.red}${msg}${c.reset}`);
}

export function printYellow(msg: string): void {
  console.log(`${c.yellow}${msg}${c.reset}`);
}

export function printGreen(msg: string): void {
  console.log(`${c.green}${msg}${c.reset}`);
}
