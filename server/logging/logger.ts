import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLogLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLogLevel];
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function formatMessage(level: LogLevel, message: string, context?: string): string {
  const timestamp = formatTimestamp();
  const ctx = context ? `[${context}]` : '';
  return `${timestamp} [${level.toUpperCase()}]${ctx} ${message}`;
}

export function log(level: LogLevel, message: string, context?: string): void {
  if (!shouldLog(level)) return;

  const formatted = formatMessage(level, message, context);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function debug(message: string, context?: string): void {
  log('debug', message, context);
}

export function info(message: string, context?: string): void {
  log('info', message, context);
}

export function warn(message: string, context?: string): void {
  log('warn', message, context);
}

export function error(message: string, context?: string): void {
  log('error', message, context);
}

/**
 * Appends plain text to a file, creating its directory on first write.
 * Failures, including an uncreatable directory, go to the console logger
 * and are never thrown.
 */
export class FileLogger {
  private filePath: string;
  private dirReady = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  private ensureDir(): void {
    if (this.dirReady) return;
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    this.dirReady = true;
  }

  append(content: string): void {
    try {
      this.ensureDir();
      appendFileSync(this.filePath, content);
    } catch (err) {
      error(`Failed to write to log file ${this.filePath}: ${err}`, 'FileLogger');
    }
  }

  appendLine(content: string): void {
    this.append(content + '\n');
  }

  appendWithTimestamp(content: string): void {
    this.appendLine(`[${formatTimestamp()}] ${content}`);
  }
}
