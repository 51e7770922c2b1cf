// src/utils/logger.ts

import * as fs from "fs";
import * as path from "path";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  SUCCESS = "SUCCESS",
  WARN = "WARN",
  ERROR = "ERROR",
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.SUCCESS]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return null;
  }
}

export class Logger {
  private level: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
  private logFile: string | null = process.env.LOG_FILE
    ? path.resolve(process.env.LOG_FILE)
    : null;

  configure(options: { level?: LogLevel; file?: string | null }): void {
    if (options.level) this.level = options.level;
    if (options.file !== undefined) {
      this.logFile = options.file ? path.resolve(options.file) : null;
    }
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  private colorize(level: LogLevel, message: string): string {
    const colors = {
      [LogLevel.DEBUG]: "\x1b[90m", // Grey
      [LogLevel.INFO]: "\x1b[36m", // Cyan
      [LogLevel.WARN]: "\x1b[33m", // Yellow
      [LogLevel.ERROR]: "\x1b[31m", // Red
      [LogLevel.SUCCESS]: "\x1b[32m", // Green
    };
    const reset = "\x1b[0m";
    return `${colors[level]}${message}${reset}`;
  }

  private writeToFile(formattedMessage: string) {
    if (!this.logFile) return;
    fs.appendFileSync(this.logFile, formattedMessage + "\n");
  }

  private emit(level: LogLevel, msg: string, write: (line: string) => void) {
    if (!this.isEnabled(level)) return;
    const formatted = this.formatMessage(level, msg);
    write(this.colorize(level, formatted));
    this.writeToFile(formatted);
  }

  debug(msg: string) {
    this.emit(LogLevel.DEBUG, msg, console.debug);
  }

  info(msg: string) {
    this.emit(LogLevel.INFO, msg, console.log);
  }

  success(msg: string) {
    this.emit(LogLevel.SUCCESS, msg, console.log);
  }

  warn(msg: string, err?: unknown) {
    this.emit(LogLevel.WARN, withError(msg, err), console.warn);
  }

  error(msg: string, err?: unknown) {
    this.emit(LogLevel.ERROR, withError(msg, err), console.error);
  }
}

function withError(msg: string, err: unknown): string {
  if (err === undefined) return msg;
  const detail = err instanceof Error ? err.message : String(err);
  return `${msg} | ${detail}`;
}

export const logger = new Logger();
