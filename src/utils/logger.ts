import chalk from "chalk";

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function currentLogLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel()];
}

function formatMessage(level: string, message: string): string {
  const timestamp = new Date().toISOString();
  return `${chalk.gray(`[${timestamp}]`)} [${level.toUpperCase()}] ${message}`;
}

/**
 * Console logger gated by LOG_LEVEL
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (shouldLog("debug")) {
      console.log(chalk.gray(formatMessage("debug", message)), ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (shouldLog("info")) {
      console.log(formatMessage("info", message), ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (shouldLog("warn")) {
      console.warn(chalk.yellow(formatMessage("warn", message)), ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (shouldLog("error")) {
      console.error(chalk.red(formatMessage("error", message)), ...args);
    }
  },
};
