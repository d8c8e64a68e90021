// Structured JSON logger, with optional file output for CLI runs

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import type { LogLevel, LogEntry } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Keys that never reach the output, matched case-insensitively as substrings
const SENSITIVE_KEYS = ['secret', 'password', 'token', 'apikey', 'api_key', 'authorization'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_KEYS.some((k) => lower.includes(k))) {
      redacted[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      redacted[key] = redactSensitive(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function createLogEntry(level: LogLevel, message: string, data?: Record<string, unknown>): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(data && { data: redactSensitive(data) }),
  };
}

/** Unknown LOG_LEVEL values fall back to info. */
function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()];
}

// ─── File logging for CLI runs ───────────────────────────────────────────────

let logFilePath: string | null = null;

/** Enable file logging. Creates a timestamped log file in the given directory. */
export function enableFileLogging(dir = 'logs', prefix = 'backtest'): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const ts = new Date().toISOString().replace(/[:.]/g, '-').replace('T', '_').slice(0, 19);
  logFilePath = join(dir, `${prefix}-${ts}.log`);
  return logFilePath;
}

export function disableFileLogging(): void {
  logFilePath = null;
}

function writeToFile(output: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, output + '\n');
  } catch (err) {
    // Logging the failure through log() would recurse back here
    logFilePath = null;
    console.error(
      JSON.stringify(
        createLogEntry('error', 'File logging disabled', {
          error: err instanceof Error ? err.message : String(err),
        }),
      ),
    );
  }
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const output = JSON.stringify(createLogEntry(level, message, data));
  writeToFile(output);

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(output);
  }
}

export const logger = {
  debug: (message: string, data?: Record<string, unknown>): void => log('debug', message, data),
  info: (message: string, data?: Record<string, unknown>): void => log('info', message, data),
  warn: (message: string, data?: Record<string, unknown>): void => log('warn', message, data),
  error: (message: string, data?: Record<string, unknown>): void => log('error', message, data),
};

export { redactSensitive, createLogEntry, shouldLog };
