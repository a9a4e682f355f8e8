import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const LEVEL_COLORS: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red.bold
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

/** Changes the process-wide threshold; config loading calls this once at boot. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// Error instances stringify to {} otherwise.
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function write(level: Exclude<LogLevel, "silent">, context: string, message: string, data?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | ${JSON.stringify(data, replacer)}` : "";
  const tag = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
  const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  sink(`${chalk.dim(`[${timestamp}]`)} ${tag} ${chalk.bold(`[${context}]`)} ${message}${dataStr}`);
}

/** Context-tagged logger. Lines look like `[ts] INFO  [session] message | {"gameId":"..."}`. */
export function createLogger(context: string): Logger {
  return {
    debug: (message, data) => write("debug", context, message, data),
    info: (message, data) => write("info", context, message, data),
    warn: (message, data) => write("warn", context, message, data),
    error: (message, data) => write("error", context, message, data)
  };
}
