import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export type LogSink = { kind: "stderr" } | { kind: "file"; path: string };

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
};

type LoggingState = {
  level: LogLevel;
  sink: LogSink;
};

const state: LoggingState = {
  level: "info",
  sink: { kind: "stderr" }
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Set the process-wide level and destination. Loggers created earlier pick the
 * change up on their next call.
 */
export function configureLogging(options: { level?: LogLevel; file?: string }): void {
  if (options.level) state.level = options.level;
  if (options.file) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    state.sink = { kind: "file", path: options.file };
  } else {
    state.sink = { kind: "stderr" };
  }
}

export function getLogLevel(): LogLevel {
  return state.level;
}

const COLORS: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string) {
  if (LEVEL_RANK[level] < LEVEL_RANK[state.level]) return;
  const tag = level.toUpperCase().padEnd(5);
  if (state.sink.kind === "file") {
    // Appending synchronously keeps lines ordered around process exit.
    fs.appendFileSync(state.sink.path, `${new Date().toISOString()} ${tag} [${scope}] ${message}\n`);
    return;
  }
  process.stderr.write(`${COLORS[level](tag)} ${chalk.dim(`[${scope}]`)} ${message}\n`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write("debug", scope, message),
    info: (message) => write("info", scope, message),
    warn: (message) => write("warn", scope, message),
    error: (message) => write("error", scope, message),
    child: (sub) => createLogger(`${scope}:${sub}`)
  };
}
