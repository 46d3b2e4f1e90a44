/**
 * Relay Logger
 * Console logger for relay and agent processes, with an optional log file
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Console only; the log file stays uncolored
const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.white,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

class RelayLogger {
  private level: LogLevel;
  private logFilePath = '';
  private logStream: fs.WriteStream | null = null;

  constructor() {
    const envLevel = process.env.RELAY_LOG_LEVEL?.toLowerCase();
    this.level = envLevel && isLogLevel(envLevel) ? envLevel : 'info';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // Mirror every line into a file as well as the console
  attachFile(filePath: string): void {
    this.close();
    try {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      this.logStream = fs.createWriteStream(filePath, { flags: 'a' });
      this.logFilePath = filePath;
      this.info(`Log file: ${filePath}`, undefined, 'LOGGER');
    } catch (error) {
      // Continue without file logging
      console.warn('Relay Logger: File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
    }
  }

  private formatMessage(level: string, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data instanceof Error ? { error: data.message, name: data.name } : data)}`;
      } catch {
        logLine += ` | [Unserializable data]`;
      }
    }

    return logLine;
  }

  log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown, category: string = 'RELAY'): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const formattedMessage = this.formatMessage(level.toUpperCase(), category, message, data);

    const colored = LEVEL_COLORS[level](formattedMessage);
    if (level === 'error') {
      console.error(colored);
    } else if (level === 'warn') {
      console.warn(colored);
    } else {
      console.log(colored);
    }

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  info(message: string, data?: unknown, category: string = 'RELAY'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'RELAY'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'RELAY'): void {
    this.log('error', message, data, category);
  }

  debug(message: string, data?: unknown, category: string = 'RELAY'): void {
    this.log('debug', message, data, category);
  }

  // Connection-specific logging
  logConnection(role: string, connectionId: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${role} (${connectionId})`, details, 'CONNECTION');
  }

  logConnectionError(role: string, connectionId: string, phase: string, error: unknown): void {
    this.error(`${phase} FAILED - ${role} (${connectionId})`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    }, 'CONNECTION');
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Singleton instance
export const relayLogger = new RelayLogger();
