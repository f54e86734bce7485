import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as fs from 'fs';
import * as path from 'path';
import dayjs from 'dayjs';
import { Constants } from '../constants';

const LEVELS = ['verbose', 'debug', 'info', 'warn', 'error'] as const;

type LogLevel = (typeof LEVELS)[number];

function parseLevel(value: string): LogLevel {
  return LEVELS.find((level) => level === value.toLowerCase()) ?? 'info';
}

/**
 * Centralized logging service for the entire application
 *
 * Every service and controller logs through this service so that ingestion runs
 * of all series end up in one daily file with a context tag per component.
 *
 * Features:
 * - Multi-level logging (debug, info, warn, error, verbose)
 * - Daily file-based logging with automatic directory creation
 * - Context-aware logging for service identification
 * - Console output for errors only
 *
 * Configuration:
 * - LOG_DIR: Directory for log files (default: 'logs')
 * - LOG_LEVEL: Lowest level written to the file (default: 'INFO')
 * - APP_NAME: Application name for log file naming (default: 'metering-statistics')
 *
 * Output Files:
 * - {APP_NAME}-YYYY-MM-DD.log: Daily log files with all entries
 */
@Injectable()
export class LoggingService {
  private readonly logDir: string;
  private readonly appName: string;
  private readonly minLevel: number;

  constructor() {
    this.logDir = Constants.LOGGING.LOG_DIR;
    this.appName = Constants.LOGGING.APP_NAME;
    this.minLevel = LEVELS.indexOf(parseLevel(Constants.LOGGING.LOG_LEVEL));

    // Ensure log directory exists
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    // Clean old log files on startup
    this.cleanOldLogFiles();
  }

  private writeToFile(level: LogLevel, message: string, context?: string): void {
    if (LEVELS.indexOf(level) < this.minLevel) {
      return;
    }

    const timestamp = dayjs().format('YYYY-MM-DD HH:mm:ss.SSS');
    const contextString = context ? `[${context}] ` : '';
    const logMessage = `${timestamp} [${level.toUpperCase()}] ${contextString}${message}\n`;

    const dateStr = dayjs().format('YYYY-MM-DD');
    const logFile = path.join(this.logDir, `${this.appName}-${dateStr}.log`);

    try {
      fs.appendFileSync(logFile, logMessage);
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  /**
   * Log debug message
   */
  public debug(message: string, context?: string): void {
    this.writeToFile('debug', message, context);
  }

  /**
   * Log info message
   */
  public log(message: string, context?: string): void {
    this.writeToFile('info', message, context);
  }

  /**
   * Log warning message
   */
  public warn(message: string, context?: string): void {
    this.writeToFile('warn', message, context);
  }

  /**
   * Log error message, with the stack when an Error is given
   */
  public error(message: string, error?: unknown, context?: string): void {
    let fullMessage = message;
    if (error instanceof Error) {
      fullMessage = `${message}: ${error.message}\n${error.stack}`;
    } else if (error !== undefined) {
      fullMessage = `${message}: ${String(error)}`;
    }

    console.error(`[ERROR] ${context ? `[${context}] ` : ''}${fullMessage}`);
    this.writeToFile('error', fullMessage, context);
  }

  /**
   * Log verbose message
   */
  public verbose(message: string, context?: string): void {
    this.writeToFile('verbose', message, context);
  }

  /**
   * Clean old log files older than 5 days
   * Called automatically on service startup and daily via cron
   */
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  public cleanOldLogFiles(): void {
    try {
      if (!fs.existsSync(this.logDir)) {
        return;
      }

      const files = fs.readdirSync(this.logDir);
      const now = Date.now();
      const maxAge = 5 * 24 * 60 * 60 * 1000; // 5 days

      files.forEach((file) => {
        // Only process log files from this application
        if (!file.startsWith(this.appName) || !file.endsWith('.log')) {
          return;
        }

        const filePath = path.join(this.logDir, file);
        const fileAge = now - fs.statSync(filePath).mtime.getTime();

        if (fileAge > maxAge) {
          fs.unlinkSync(filePath);
          const ageInDays = Math.round(fileAge / (24 * 60 * 60 * 1000));
          this.writeToFile('info', `Deleted old log file: ${file} (${ageInDays} days old)`, 'LogCleanup');
        }
      });
    } catch (error) {
      console.error('Failed to clean old log files:', error);
    }
  }
}
