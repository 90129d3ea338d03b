/**
 * Structured logger with debug toggle and an optional activity log file
 *
 * Usage:
 *   import { logger } from './lib/logger.js';
 *   logger.attachLogFile('bell.log');
 *   logger.info('Bell rang', { index: 2, url });
 *   logger.error('Playback failed', { error });
 *
 * Enable debug output:
 *   BELL_DEBUG=true bell-player run
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const DEBUG_ENV = 'BELL_DEBUG';

let debugEnabled = process.env[DEBUG_ENV] === 'true';
let logFilePath: string | null = null;

// Format timestamp for console messages
const timestamp = (): string => {
  const now = new Date();
  return now.toISOString().slice(11, 23); // HH:MM:SS.mmm
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: object) => void;
  info: (message: string, data?: object) => void;
  warn: (message: string, data?: object) => void;
  error: (message: string, data?: object) => void;
  setLevel: (level: LogLevel) => void;
  enableDebug: () => void;
  disableDebug: () => void;
  attachLogFile: (path: string) => void;
  detachLogFile: () => void;
}

// Log level priority (lower = more verbose)
const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'debug';

const shouldLog = (level: LogLevel): boolean => {
  if (level === 'debug' && !debugEnabled) return false;
  return levelPriority[level] >= levelPriority[minLevel];
};

// Errors stringify to {} so flatten them before they reach the log file
const serializeData = (data: object): string =>
  JSON.stringify(data, (_key, value: unknown) =>
    value instanceof Error ? value.message : value
  );

/**
 * Format one activity log line: `<ISO time> <LEVEL> <message> [json data]`
 */
export const formatLogLine = (level: LogLevel, message: string, data?: object, at: Date = new Date()): string => {
  const base = `${at.toISOString()} ${level.toUpperCase()} ${message}`;
  return data ? `${base} ${serializeData(data)}` : base;
};

const writeToFile = (level: LogLevel, message: string, data?: object): void => {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, formatLogLine(level, message, data) + '\n', 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[Logger] Could not write to ${logFilePath}: ${reason}`);
    logFilePath = null;
  }
};

const emit = (level: LogLevel, message: string, data?: object): void => {
  if (!shouldLog(level)) return;
  const prefix = `[${timestamp()}] [${level.toUpperCase()}]`;
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (data) {
    sink(prefix, message, data);
  } else {
    sink(prefix, message);
  }
  writeToFile(level, message, data);
};

export const logger: Logger = {
  debug: (message: string, data?: object) => emit('debug', message, data),
  info: (message: string, data?: object) => emit('info', message, data),
  warn: (message: string, data?: object) => emit('warn', message, data),
  error: (message: string, data?: object) => emit('error', message, data),

  setLevel: (level: LogLevel) => {
    minLevel = level;
  },

  enableDebug: () => {
    debugEnabled = true;
  },

  disableDebug: () => {
    debugEnabled = false;
  },

  attachLogFile: (path: string) => {
    mkdirSync(dirname(path), { recursive: true });
    logFilePath = path;
  },

  detachLogFile: () => {
    logFilePath = null;
  },
};

// Export helper to check debug state
export const isDebug = (): boolean => debugEnabled;
