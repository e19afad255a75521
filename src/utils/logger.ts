import fs from 'fs';
import path from 'path';
import util from 'util';

// Configuration for logging levels
export const LOG_LEVELS = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Log loop state transitions with special formatting */
  transition(state: string, data?: unknown): void;
  browser: {
    action(type: string, data?: unknown): void;
    error(type: string, error: unknown): void;
  };
  setLevel(level: LogLevel): void;
  /** Flush and release the file sink, if any. Safe to call twice. */
  close(): Promise<void>;
  getLogFilePath(): string | null;
}

export interface LoggerOptions {
  /** Append log lines to this file as well as the console */
  filePath?: string;
  level?: LogLevel;
  console?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// Utility to format objects for logging
export function formatData(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;

  // Handle Error objects specially
  if (data instanceof Error) {
    return `${data.message}\n${data.stack ?? ''}`.trimEnd();
  }

  return util.inspect(data, {
    depth: 4,
    colors: false,
    maxArrayLength: 10,
    breakLength: 120
  });
}

// Get ANSI color code for log level
function getColorForLevel(level: LogLevel): string {
  switch (level) {
    case 'DEBUG': return '\x1b[90m'; // Gray
    case 'INFO': return '\x1b[32m';  // Green
    case 'WARN': return '\x1b[33m';  // Yellow
    case 'ERROR': return '\x1b[31m'; // Red
  }
}

/**
 * Create a logger. Sessions get their own instance with a file sink and close it
 * when they end; nothing is opened at import time.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const filePath = options.filePath ?? null;
  const toConsole = options.console ?? true;
  let currentLogLevel: number = LOG_LEVELS[options.level ?? 'INFO'];
  let logStream: fs.WriteStream | null = null;

  if (filePath) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logStream = fs.createWriteStream(filePath, { flags: 'a' });
    logStream.on('error', (err) => {
      console.error(`Log file ${filePath} is not writable:`, err.message);
    });
  }

  function log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < currentLogLevel) return;

    const timestamp = new Date().toISOString();
    const formattedData = formatData(data);
    const suffix = formattedData ? '\n' + formattedData : '';

    logStream?.write(`[${timestamp}] [${level}] ${message}${suffix}\n`);

    if (!toConsole) return;
    const consoleMsg = `[${timestamp}] ${getColorForLevel(level)}[${level}]\x1b[0m ${message}${suffix}`;
    if (level === 'ERROR') {
      console.error(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  return {
    debug: (msg, data) => log('DEBUG', msg, data),
    info: (msg, data) => log('INFO', msg, data),
    warn: (msg, data) => log('WARN', msg, data),
    error: (msg, data) => log('ERROR', msg, data),

    transition: (state, data) => {
      log('INFO', `State Transition: ${state}`, data);
    },

    browser: {
      action: (type, data) => {
        log('INFO', `Browser Action: ${type}`, data);
      },
      error: (type, error) => {
        log('ERROR', `Browser Error: ${type}`, error);
      }
    },

    setLevel: (level) => {
      currentLogLevel = LOG_LEVELS[level];
    },

    close: () => new Promise<void>((resolve) => {
      const stream = logStream;
      logStream = null;
      if (!stream) {
        resolve();
        return;
      }
      stream.end(() => resolve());
    }),

    getLogFilePath: () => filePath
  };
}

const envLevel = process.env.LOG_LEVEL?.toUpperCase() ?? '';

// Console-only process logger for code that runs outside a session
const logger = createLogger({ level: isLogLevel(envLevel) ? envLevel : 'INFO' });

export default logger;
