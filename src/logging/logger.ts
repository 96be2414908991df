import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import type { LogLevel } from "../config/index.js";
import { describeError } from "../errors.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  console?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] ${level.toUpperCase()} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const echo = options.console ?? true;
  let file = options.file;

  const writeToFile = (line: string): void => {
    if (!file) return;
    try {
      const dir = dirname(file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(file, line + "\n");
    } catch (error) {
      // One report, then the file sink stays off for this process.
      console.error(chalk.yellow(`Logging to ${file} disabled: ${describeError(error)}`));
      file = undefined;
    }
  };

  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    writeToFile(formatLogLine(level, message));

    if (!echo) return;
    if (level === "error") {
      console.error(chalk.red(message));
    } else if (level === "warn") {
      console.error(chalk.yellow(message));
    }
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
