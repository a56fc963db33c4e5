import fs from 'fs';
import path from 'path';
import { SecurityService } from './security.js';

export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  logDir: string;
  maxBytes?: number;
  backupCount?: number;
  console?: boolean;
}

const DEFAULT_MAX_BYTES = 32 * 1024 * 1024;
const DEFAULT_BACKUP_COUNT = 5;

export class Logger {
  // File output is off until init() names a directory
  private static logDir: string | null = null;
  private static maxBytes = DEFAULT_MAX_BYTES;
  private static backupCount = DEFAULT_BACKUP_COUNT;
  private static consoleEnabled = true;

  static init(options: LoggerOptions): void {
    this.logDir = options.logDir;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.backupCount = options.backupCount ?? DEFAULT_BACKUP_COUNT;
    this.consoleEnabled = options.console ?? true;

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
      this.info('Created logs directory', { logDir: this.logDir });
    }
  }

  static get appLogPath(): string | null {
    return this.logDir ? path.join(this.logDir, 'app.log') : null;
  }

  static get errorLogPath(): string | null {
    return this.logDir ? path.join(this.logDir, 'error.log') : null;
  }

  static formatMessage(level: LogLevel, message: string, error?: Error, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
    const errorStr = error ? ` | Error: ${error.message} | Stack: ${error.stack}` : '';

    return SecurityService.redactSecrets(`[${timestamp}] ${level}: ${message}${contextStr}${errorStr}`) + '\n';
  }

  private static rotate(filePath: string): void {
    for (let i = this.backupCount - 1; i >= 1; i--) {
      const from = `${filePath}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${filePath}.${i + 1}`);
      }
    }
    if (this.backupCount > 0) {
      fs.renameSync(filePath, `${filePath}.1`);
    } else {
      fs.truncateSync(filePath, 0);
    }
  }

  private static writeToFile(filePath: string | null, message: string): void {
    if (!filePath) return;

    try {
      if (fs.existsSync(filePath) && fs.statSync(filePath).size + Buffer.byteLength(message) > this.maxBytes) {
        this.rotate(filePath);
      }
      fs.appendFileSync(filePath, message);
    } catch (err) {
      console.error('Failed to write to log file:', err);
    }
  }

  static error(message: string, error?: Error, context?: LogContext): void {
    const logMessage = this.formatMessage(LogLevel.ERROR, message, error, context);

    this.writeToFile(this.errorLogPath, logMessage);
    this.writeToFile(this.appLogPath, logMessage);

    if (this.consoleEnabled) {
      console.error(logMessage.trimEnd());
    }
  }

  static warn(message: string, context?: LogContext): void {
    const logMessage = this.formatMessage(LogLevel.WARN, message, undefined, context);

    this.writeToFile(this.appLogPath, logMessage);
    if (this.consoleEnabled) {
      console.warn(logMessage.trimEnd());
    }
  }

  static info(message: string, context?: LogContext): void {
    const logMessage = this.formatMessage(LogLevel.INFO, message, undefined, context);

    this.writeToFile(this.appLogPath, logMessage);
    if (this.consoleEnabled) {
      console.log(logMessage.trimEnd());
    }
  }

  static debug(message: string, context?: LogContext): void {
    const logMessage = this.formatMessage(LogLevel.DEBUG, message, undefined, context);

    this.writeToFile(this.appLogPath, logMessage);

    // Only show debug in development
    if (this.consoleEnabled && process.env.NODE_ENV !== 'production') {
      console.debug(logMessage.trimEnd());
    }
  }

  static logIpCheck(result: { success: boolean; currentIp?: string; error?: string; context?: LogContext }): void {
    const message = result.success
      ? `IP check successful: ${result.currentIp}`
      : `IP check failed: ${result.error}`;

    if (result.success) {
      this.info(message, result.context);
    } else {
      this.error(message, undefined, { ...result.context, error: result.error });
    }
  }

  static logNotification(result: { success: boolean; chatId: number | string; text: string; error?: string }): void {
    if (result.success) {
      this.info(`Sent message: \`${result.text}\` to chat ID: \`${result.chatId}\`.`);
    } else {
      this.error('Failed to send message', undefined, {
        chatId: result.chatId,
        text: result.text,
        error: result.error
      });
    }
  }
}
