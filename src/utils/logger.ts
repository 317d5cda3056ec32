import { existsSync, mkdirSync, appendFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: LogData;
}

/**
 * Log directory: BOXFALL_LOG_DIR when set, otherwise ~/.boxfall/logs
 */
export function getLogDir(): string {
  return process.env.BOXFALL_LOG_DIR || join(homedir(), '.boxfall', 'logs');
}

/**
 * Get log file path for today
 */
export function getLogFilePath(date: Date = new Date()): string {
  const day = date.toISOString().split('T')[0]; // YYYY-MM-DD
  return join(getLogDir(), `boxfall-${day}.log`);
}

/**
 * Format log entry as string
 */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${dataStr}\n`;
}

/**
 * Write log entry to file
 */
function writeLog(level: LogLevel, message: string, data?: LogData): void {
  try {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    };

    const logDir = getLogDir();
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    appendFileSync(getLogFilePath(), formatLogEntry(entry), 'utf-8');
  } catch {
    // Logging must never take the showcase down; there is nowhere else to report to
  }
}

/**
 * Logger API
 */
export const logger = {
  info: (message: string, data?: LogData) => writeLog('info', message, data),
  warn: (message: string, data?: LogData) => writeLog('warn', message, data),
  error: (message: string, data?: LogData) => writeLog('error', message, data),
  debug: (message: string, data?: LogData) => writeLog('debug', message, data),
};

/**
 * Log application startup
 */
export function logStartup(version: string, data?: LogData): void {
  logger.info('Application started', { version, ...data });
}

/**
 * Log application error
 */
export function logAppError(error: Error, context?: string): void {
  logger.error('Application error', {
    context,
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
}
