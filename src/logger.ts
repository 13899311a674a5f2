import { appendFileSync } from "fs";
import chalk from "chalk";

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append every line to this file. */
  logFile?: string;
  /** Write to the console. Defaults to true. */
  console?: boolean;
}

type WrittenLevel = Exclude<LogLevel, "silent">;

export function formatLogLine(
  level: WrittenLevel,
  message: string,
  data?: LogData,
  timestamp: string = new Date().toISOString()
): string {
  const payload = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`;
}

function writeConsole(level: WrittenLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(chalk.red(line));
      break;
    case "warn":
      console.warn(chalk.yellow(line));
      break;
    case "debug":
      console.log(chalk.dim(line));
      break;
    default:
      console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? "info"];
  const toConsole = options.console ?? true;
  let logFileFailed = false;

  const write = (level: WrittenLevel, message: string, data?: LogData): void => {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }

    const line = formatLogLine(level, message, data);
    if (toConsole) {
      writeConsole(level, line);
    }

    if (options.logFile) {
      try {
        appendFileSync(options.logFile, line + "\n");
      } catch (error) {
        // Reported once per logger; later failures stay quiet
        if (logFileFailed) {
          return;
        }
        logFileFailed = true;
        process.stderr.write(
          `notehook: could not write log file ${options.logFile}: ${error instanceof Error ? error.message : String(error)}\n`
        );
      }
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", console: false });
