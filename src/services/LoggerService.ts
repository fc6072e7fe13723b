/**
 * @file LoggerService - Unified logging service
 * @description Module-scoped logging over electron-log's Node transport, with an optional log file.
 */

import path from 'path';
import log from 'electron-log/node';

// ====== Types ======

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface LoggerOptions {
  /** Minimum level written to the console */
  level?: LogLevel;
  /** Also append to this file when set */
  file?: string;
}

// ====== Logger Implementation ======

class LoggerServiceImpl {
  private static instance: LoggerServiceImpl;
  private logFile = '';

  private constructor() {
    this.initializeTransports();
  }

  public static getInstance(): LoggerServiceImpl {
    if (!LoggerServiceImpl.instance) {
      LoggerServiceImpl.instance = new LoggerServiceImpl();
    }
    return LoggerServiceImpl.instance;
  }

  private initializeTransports(): void {
    log.transports.console.level = process.env.NODE_ENV === 'development' ? 'debug' : 'info';
    log.transports.console.format = '{h}:{i}:{s}.{ms} [{level}] {text}';

    // Off until configure() names a file
    log.transports.file.level = false;
    log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
    log.transports.file.resolvePathFn = () => this.logFile;
  }

  /**
   * Apply configuration once it has been loaded
   */
  public configure(options: LoggerOptions): void {
    if (options.level) {
      log.transports.console.level = options.level;
    }

    if (options.file) {
      this.logFile = path.resolve(options.file);
      log.transports.file.level = options.level === 'debug' ? 'debug' : 'info';
    } else {
      this.logFile = '';
      log.transports.file.level = false;
    }
  }

  /**
   * Create a logger with module context
   */
  public withContext(moduleName: string): Logger {
    return {
      debug: (message, data) => this.log('debug', moduleName, message, data),
      info: (message, data) => this.log('info', moduleName, message, data),
      warn: (message, data) => this.log('warn', moduleName, message, data),
      error: (message, data) => this.log('error', moduleName, message, data),
    };
  }

  private log(level: LogLevel, module: string, message: string, data?: unknown): void {
    const formattedMessage = `[${module}] ${message}`;
    const logData = data !== undefined ? [formattedMessage, data] : [formattedMessage];

    switch (level) {
      case 'debug':
        log.debug(...logData);
        break;
      case 'info':
        log.info(...logData);
        break;
      case 'warn':
        log.warn(...logData);
        break;
      case 'error':
        log.error(...logData);
        break;
    }
  }
}

// ====== Exports ======

export const LoggerService = LoggerServiceImpl.getInstance();

/** Create a logger instance with module context */
export function createLogger(moduleName: string): Logger {
  return LoggerService.withContext(moduleName);
}
