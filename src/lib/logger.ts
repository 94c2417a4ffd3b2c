/**
 * Tender Watch — Logger
 *
 * Simple structured logging utility.
 * Console output is human-readable in development and JSON in production.
 * While a run log is attached, every entry is also appended to it as JSON.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Get log level from environment, default to 'info'
const configuredLevel = process.env.LOG_LEVEL ?? 'info';
const currentLevelNum = isLogLevel(configuredLevel) ? LOG_LEVELS[configuredLevel] : LOG_LEVELS.info;

let runLogPath: string | null = null;

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function appendToRunLog(line: string): void {
  if (!runLogPath) return;
  appendFileSync(runLogPath, line + '\n', 'utf-8');
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  // The run log keeps everything, including debug
  appendToRunLog(JSON.stringify(entry));

  if (!shouldLog(level)) return;

  const formatted = formatEntry(entry);

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

/**
 * Logger interface.
 */
export const logger = {
  debug: (message: string, context?: LogContext) => log('debug', message, context),
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext) => log('error', message, context),

  /**
   * Create a child logger with default context.
   */
  child: (defaultContext: LogContext): Logger => ({
    debug: (message: string, context?: LogContext) =>
      log('debug', message, { ...defaultContext, ...context }),
    info: (message: string, context?: LogContext) =>
      log('info', message, { ...defaultContext, ...context }),
    warn: (message: string, context?: LogContext) =>
      log('warn', message, { ...defaultContext, ...context }),
    error: (message: string, context?: LogContext) =>
      log('error', message, { ...defaultContext, ...context }),
  }),
};

// ============================================================
// RUN LOG
// ============================================================

/**
 * File name stamp, e.g. 2026-10-19_06-00-00 (UTC).
 */
export function runLogStamp(date: Date = new Date()): string {
  return date.toISOString().replace('T', '_').replace(/:/g, '-').split('.')[0] ?? '';
}

/**
 * Start appending every log entry to a timestamped file.
 * Returns the path of the file.
 */
export function attachRunLog(dir: string, prefix: string, date: Date = new Date()): string {
  mkdirSync(dir, { recursive: true });
  runLogPath = join(dir, `${prefix}_${runLogStamp(date)}.log`);
  return runLogPath;
}

export function detachRunLog(): void {
  runLogPath = null;
}

/**
 * Append plain text lines (e.g. the run summary) to the run log.
 */
export function writeRunLog(lines: string[]): void {
  for (const line of lines) {
    appendToRunLog(line);
  }
}

/**
 * Print operator-facing lines to stdout and append them to the run log.
 */
export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
  writeRunLog(lines);
}

/**
 * Performance timing utility.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    logger.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
