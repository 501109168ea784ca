import { env, type LogLevel } from "../config/env.js";

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function emit(
  tag: string,
  level: Exclude<LogLevel, "silent">,
  message: string,
  context?: LogContext
): void {
  if (RANK[level] < RANK[env.logLevel]) return;

  const write =
    level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  const line = `[${tag}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
}

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag: string): Logger {
  return {
    debug: (message, context) => emit(tag, "debug", message, context),
    info: (message, context) => emit(tag, "info", message, context),
    warn: (message, context) => emit(tag, "warn", message, context),
    error: (message, context) => emit(tag, "error", message, context),
  };
}
