// logger.ts - Component logging for the SLE automation pipeline
import * as fs from 'fs';
import * as path from 'path';
import { sanitizeLogData, sanitizeMessage } from '../security/log-sanitizer';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

/**
 * The slice of {@link Logger} that pipeline components depend on. Tests hand
 * components a plain object of jest mocks with this shape.
 */
export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown, error?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
}

export interface LoggerOptions {
  logDir?: string;
  minLevel?: LogLevel;
  console?: boolean;
}

export class Logger implements ComponentLogger {
  private component: string;
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private writeConsole: boolean;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  constructor(component: string, options: LoggerOptions = {}) {
    this.component = component;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.writeConsole = options.console ?? true;

    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      this.logFile = path.join(options.logDir, `${component}.log`);
      this.rotateLogsIfNeeded();
    }
  }

  /** Logger for a sub-component sharing this logger's destination and level. */
  child(component: string): Logger {
    const child = new Logger(`${this.component}:${component}`, {
      minLevel: this.minLevel,
      console: this.writeConsole
    });
    child.logFile = this.logFile;
    return child;
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) return;

    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile);
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${sanitizeMessage(message)}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(sanitizeLogData(data), null, 2)}`;
    }

    if (error !== undefined) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${sanitizeMessage(errorMessage)}`;
      // Stack traces only for ERROR and above
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${sanitizeMessage(error.stack)}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    // stdout carries the CLI's JSON summary, so every log line goes to stderr
    if (this.writeConsole) {
      console.error(logMessage.trim());
    }

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, logMessage);
        this.rotateLogsIfNeeded();
      } catch (err) {
        console.error('Failed to write log:', err);
      }
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'CRITICAL':
      return LogLevel.CRITICAL;
    default:
      return LogLevel.INFO;
  }
}

export default Logger;
