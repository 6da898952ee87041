/**
 * MCP Server Logging Module
 *
 * Structured logging with:
 * - ISO timestamps
 * - Log levels (DEBUG, INFO, WARN, ERROR), threshold from LOG_LEVEL
 * - Optional JSON-lines file output via LOG_FILE
 *
 * Everything goes to stderr; stdout carries the MCP protocol.
 *
 * Usage:
 *   import { log, logToolCall } from './lib/logger.js';
 *   log.info('Connected to FortiManager', { host });
 *   logToolCall('install_package', args, { success: true }, durationMs);
 */

import { appendFileSync } from 'node:fs';
import { redactArgs } from './sanitize.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = (value || 'INFO').toUpperCase();
  if (upper === 'WARNING') return 'WARN';
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return 'INFO';
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
let logFile: string | undefined = process.env.LOG_FILE;
let fileErrorReported = false;

/** Override the env-derived settings (used by config loading and tests) */
export function configureLogger(options: { level?: LogLevel; file?: string }): void {
  if (options.level) threshold = options.level;
  if ('file' in options) {
    logFile = options.file;
    fileErrorReported = false;
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}

export function formatLog(entry: LogEntry): string {
  const { timestamp, level, message, data } = entry;
  if (data && Object.keys(data).length > 0) {
    return `[${timestamp}] [${level}] ${message} ${JSON.stringify(data)}`;
  }
  return `[${timestamp}] [${level}] ${message}`;
}

function writeLog(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  console.error(formatLog(entry));

  if (logFile) {
    try {
      appendFileSync(logFile, JSON.stringify(entry) + '\n');
    } catch (error) {
      if (!fileErrorReported) {
        fileErrorReported = true;
        console.error(`[logger] cannot write LOG_FILE ${logFile}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

function createLogger(level: LogLevel) {
  return (message: string, data?: Record<string, unknown>): void => {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    });
  };
}

export const log = {
  debug: createLogger('DEBUG'),
  info: createLogger('INFO'),
  warn: createLogger('WARN'),
  error: createLogger('ERROR'),
};

/**
 * Audit record for a finished tool call
 */
export function logToolCall(
  toolName: string,
  args: Record<string, unknown>,
  result: { success: boolean; error?: string },
  durationMs: number
): void {
  const data = {
    tool: toolName,
    args: redactArgs(args),
    success: result.success,
    error: result.error,
    durationMs,
  };
  if (result.success) {
    log.info(`Tool call: ${toolName}`, data);
  } else {
    log.warn(`Tool call failed: ${toolName}`, data);
  }
}
