/**
 * Structured file logger for narnia-setup
 *
 * The terminal belongs to the progress spinner and the prompts, so log lines
 * go to ~/.narnia/logs/narnia-YYYY-MM-DD.log and only fall back to stderr
 * when that file cannot be opened.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type Component = 'SETUP' | 'RUNNER' | 'PROFILE' | 'FILES' | 'CUSTOMIZE' | 'FEEDBACK' | 'SYSTEM';

export interface LogContext {
  step?: string;
  [key: string]: unknown;
}

// NOTE: Must match the NARNIA_DATA_DIR default in src/shared/SettingsDefaultsManager.ts
// Inlined so the logger never depends on the settings loader
function resolveDataDir(): string {
  return process.env.NARNIA_DATA_DIR || join(homedir(), '.narnia');
}

function parseLevel(value: unknown): LogLevel | null {
  if (typeof value !== 'string') return null;
  switch (value.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return null;
  }
}

class Logger {
  private level: LogLevel | null = null;
  private logFilePath: string | null = null;
  private logFileInitialized: boolean = false;

  /**
   * Initialize log file path and ensure directory exists (lazy initialization)
   */
  private ensureLogFileInitialized(): void {
    if (this.logFileInitialized) return;
    this.logFileInitialized = true;

    try {
      const logsDir = join(resolveDataDir(), 'logs');
      if (!existsSync(logsDir)) {
        mkdirSync(logsDir, { recursive: true });
      }

      const date = new Date().toISOString().split('T')[0];
      this.logFilePath = join(logsDir, `narnia-${date}.log`);
    } catch (error) {
      process.stderr.write(`[LOGGER] Failed to initialize log file: ${String(error)}\n`);
      this.logFilePath = null;
    }
  }

  /**
   * Resolve the level once: NARNIA_LOG_LEVEL from the environment, then from
   * the settings file, then INFO
   */
  private getLevel(): LogLevel {
    if (this.level !== null) return this.level;

    const fromEnv = parseLevel(process.env.NARNIA_LOG_LEVEL);
    if (fromEnv !== null) {
      this.level = fromEnv;
      return fromEnv;
    }

    this.level = LogLevel.INFO;
    try {
      const settingsPath = join(resolveDataDir(), 'settings.json');
      if (existsSync(settingsPath)) {
        const settings: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
        if (typeof settings === 'object' && settings !== null && 'NARNIA_LOG_LEVEL' in settings) {
          this.level = parseLevel(settings.NARNIA_LOG_LEVEL) ?? LogLevel.INFO;
        }
      }
    } catch (error) {
      process.stderr.write(`[LOGGER] Unreadable settings, logging at INFO: ${String(error)}\n`);
    }
    return this.level;
  }

  /**
   * Format data for logging - compact summaries instead of full dumps
   */
  private formatData(data: unknown): string {
    if (data === null || data === undefined) return '';
    if (typeof data === 'string') return data;
    if (typeof data === 'number' || typeof data === 'boolean') return data.toString();

    if (data instanceof Error) {
      return this.getLevel() === LogLevel.DEBUG
        ? `${data.message}\n${data.stack}`
        : data.message;
    }

    if (Array.isArray(data)) {
      return `[${data.length} items]`;
    }

    if (typeof data === 'object') {
      const keys = Object.keys(data);
      if (keys.length === 0) return '{}';
      if (keys.length <= 3) return JSON.stringify(data);
      return `{${keys.length} keys: ${keys.slice(0, 3).join(', ')}...}`;
    }

    return String(data);
  }

  /**
   * Format timestamp in local timezone (YYYY-MM-DD HH:MM:SS.mmm)
   */
  private formatTimestamp(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    const hours = String(date.getHours()).padStart(2, '0');
    const minutes = String(date.getMinutes()).padStart(2, '0');
    const seconds = String(date.getSeconds()).padStart(2, '0');
    const ms = String(date.getMilliseconds()).padStart(3, '0');
    return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${ms}`;
  }

  private log(
    level: LogLevel,
    component: Component,
    message: string,
    context?: LogContext,
    data?: unknown
  ): void {
    if (level < this.getLevel()) return;

    this.ensureLogFileInitialized();

    const timestamp = this.formatTimestamp(new Date());
    const levelStr = LogLevel[level].padEnd(5);
    const componentStr = component.padEnd(9);

    let stepStr = '';
    if (context?.step) {
      stepStr = `[${context.step}] `;
    }

    let dataStr = '';
    if (data !== undefined && data !== null) {
      if (data instanceof Error) {
        dataStr = this.getLevel() === LogLevel.DEBUG
          ? `\n${data.message}\n${data.stack}`
          : ` ${data.message}`;
      } else if (this.getLevel() === LogLevel.DEBUG && typeof data === 'object') {
        dataStr = '\n' + JSON.stringify(data, null, 2);
      } else {
        dataStr = ' ' + this.formatData(data);
      }
    }

    let contextStr = '';
    if (context) {
      const { step, ...rest } = context;
      if (Object.keys(rest).length > 0) {
        const pairs = Object.entries(rest).map(([k, v]) => `${k}=${String(v)}`);
        contextStr = ` {${pairs.join(', ')}}`;
      }
    }

    const logLine = `[${timestamp}] [${levelStr}] [${componentStr}] ${stepStr}${message}${contextStr}${dataStr}`;

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, logLine + '\n', 'utf8');
      } catch (error) {
        process.stderr.write(`[LOGGER] Failed to write to log file: ${String(error)}\n`);
      }
    } else {
      process.stderr.write(logLine + '\n');
    }
  }

  debug(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.log(LogLevel.DEBUG, component, message, context, data);
  }

  info(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.log(LogLevel.INFO, component, message, context, data);
  }

  warn(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.log(LogLevel.WARN, component, message, context, data);
  }

  error(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.log(LogLevel.ERROR, component, message, context, data);
  }

  success(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.info(component, `✓ ${message}`, context, data);
  }

  failure(component: Component, message: string, context?: LogContext, data?: unknown): void {
    this.error(component, `✗ ${message}`, context, data);
  }

  timing(component: Component, message: string, durationMs: number, context?: LogContext): void {
    this.info(component, `⏱ ${message}`, context, { duration: `${durationMs}ms` });
  }
}

export const logger = new Logger();
