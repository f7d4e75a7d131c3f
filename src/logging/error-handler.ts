/**
 * Error Logging and Handling System
 * Centralized log buffer and console output for the network ACL module
 */

import { ConfigValidationError, ConfigurationError } from "../core/errors";

export enum ErrorLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const SEVERITY: Record<ErrorLevel, number> = {
  [ErrorLevel.DEBUG]: 0,
  [ErrorLevel.INFO]: 1,
  [ErrorLevel.WARN]: 2,
  [ErrorLevel.ERROR]: 3,
  [ErrorLevel.FATAL]: 4
};

export interface ErrorLog {
  level: ErrorLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string, level: ErrorLevel) => void;

const consoleSink: LogSink = (line, level) => {
  if (SEVERITY[level] >= SEVERITY[ErrorLevel.ERROR]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class ErrorHandler {
  private logs: ErrorLog[] = [];

  constructor(
    private readonly minLevel: ErrorLevel = ErrorLevel.INFO,
    private readonly sink: LogSink = consoleSink
  ) {}

  log(level: ErrorLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) {
      return;
    }
    const errorLog: ErrorLog = {
      level,
      message,
      timestamp: new Date(),
      stack: error?.stack,
      context
    };
    this.logs.push(errorLog);
    this.outputLog(errorLog);
  }

  /** Logs a failure with the input path and constraint when the error carries them. */
  report(error: unknown): void {
    if (error instanceof ConfigurationError) {
      this.log(ErrorLevel.ERROR, error.message, error, { input: error.input, constraint: error.constraint });
    } else if (error instanceof ConfigValidationError) {
      this.log(ErrorLevel.ERROR, error.message, error, { issues: error.issues });
    } else if (error instanceof Error) {
      this.log(ErrorLevel.ERROR, error.message, error);
    } else {
      this.log(ErrorLevel.ERROR, String(error));
    }
  }

  private outputLog(log: ErrorLog): void {
    const logMessage = `[${log.timestamp.toISOString()}] ${log.level}: ${log.message}`;
    this.sink(logMessage, log.level);
  }

  getLogs(level?: ErrorLevel): ErrorLog[] {
    if (level) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }

  clearLogs(): void {
    this.logs = [];
  }
}
