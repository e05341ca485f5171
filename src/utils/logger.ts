import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, ParserConfig } from '../config';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * File logger. stdout carries the report and stderr the fatal messages,
 * so nothing here ever writes to the console.
 */
export class Logger {
  private logPath: string | null;
  private debugEnabled: boolean;
  private component: string;

  private constructor(component: string, config: ParserConfig) {
    this.component = component;
    this.logPath = config.logPath;
    this.debugEnabled = config.debug;
    this.ensureLogDirectory();
  }

  static create(component: string, config: ParserConfig = loadConfig()): Logger {
    return new Logger(component, config);
  }

  private ensureLogDirectory(): void {
    if (!this.logPath) return;
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    } catch {
      // Directory might already exist
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.logPath) return;
    try {
      const formattedMessage = this.formatMessage(level, message, data);
      fs.appendFileSync(this.logPath, formattedMessage + '\n', 'utf8');
    } catch {
      // Silent failure if we can't write logs
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.debugEnabled) {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData: Record<string, unknown> = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, errorData);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: Record<string, unknown>): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log command execution
   */
  command(cmd: string, args?: string[]): void {
    this.info(`Executing command: ${cmd}`, { args });
  }

  /**
   * Log decision points
   */
  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}
