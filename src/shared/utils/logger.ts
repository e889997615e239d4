/**
 * Logger for the grades monitor
 *
 * Levelled, component-prefixed console logging with an optional
 * append-only log file. One instance is created per run and handed to
 * every component through the run context; components derive their own
 * prefix with `child()`.
 */

import fs from 'fs';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Log level (default: LOG_LEVEL env var, else 'info') */
  level?: LogLevel;
  /** Component/module name for prefixing logs */
  component?: string;
  /** Append every emitted line to this file (default: none) */
  logFilePath?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

export class Logger {
  private level: LogLevel;
  private levelNum: number;
  private component: string;
  private logFilePath?: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getDefaultLogLevel();
    this.levelNum = LOG_LEVELS[this.level];
    this.component = config.component ?? 'WebSinu';
    this.logFilePath = config.logFilePath;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= this.levelNum;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}`;
  }

  private writeToFile(line: string): void {
    if (!this.logFilePath) return;

    try {
      fs.appendFileSync(this.logFilePath, line + '\n', 'utf-8');
    } catch (error) {
      // Console output still has the line; report once and stop writing
      console.error(`[Logger] Cannot write to ${this.logFilePath}: ${error instanceof Error ? error.message : String(error)}`);
      this.logFilePath = undefined;
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;

    const formatted = this.formatMessage('error', message);
    console.error(formatted);
    this.writeToFile(formatted);

    if (error !== undefined && this.levelNum >= LOG_LEVELS.debug) {
      console.error(error);
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;

    const formatted = this.formatMessage('warn', message);
    console.warn(formatted);
    this.writeToFile(formatted);
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;

    const formatted = this.formatMessage('info', message);
    console.log(formatted);
    this.writeToFile(formatted);
  }

  debug(message: string, data?: unknown): void {
    if (!this.shouldLog('debug')) return;

    const formatted = this.formatMessage('debug', message);
    console.log(formatted);
    this.writeToFile(formatted);

    if (data !== undefined) {
      const dump = `  Data: ${JSON.stringify(data, null, 2)}`;
      console.log(dump);
      this.writeToFile(dump);
    }
  }

  /**
   * Create a child logger with a different component name
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component,
      logFilePath: this.logFilePath
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.levelNum = LOG_LEVELS[level];
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, config?: Omit<LoggerConfig, 'component'>): Logger {
  return new Logger({ ...config, component });
}

/**
 * Redact sensitive values in a form payload for safe logging
 */
export function redactSensitive(
  obj: Readonly<Record<string, string>>,
  sensitiveKeys: string[] = ['password', 'sid', 'token', 'cookie']
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(k => keyLower === k || keyLower.includes(k));
    result[key] = isSensitive && value.length > 0 ? '<redacted>' : value;
  }

  return result;
}

/**
 * Safely truncate a string for logging (useful for usernames, etc.)
 */
export function truncateForLog(value: string, showChars: number = 3): string {
  if (value.length <= showChars) return '*'.repeat(value.length);
  return value.substring(0, showChars) + '***';
}
