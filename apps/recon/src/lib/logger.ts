/**
 * Structured logger
 *
 * - Console output keeps the `[Scope] message` convention
 * - Levels below the configured threshold are dropped
 * - Optional JSON-lines file sink (one object per line, append-only)
 *
 * Destinations and rotation belong to the caller; the core only receives a
 * Logger instance.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component, e.g. `ReportRun` -> `ReportRun:sales` */
  child(scope: string): Logger;
}

/**
 * Log entry structure written to the file sink
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file as well as the console */
  filePath?: string;
}

type Sink = (entry: LogEntry) => void;

function createFileSink(filePath: string): Sink {
  mkdirSync(dirname(filePath), { recursive: true });
  let failed = false;

  return (entry) => {
    if (failed) return;
    try {
      appendFileSync(filePath, JSON.stringify(entry) + '\n');
    } catch (err) {
      // Report once, then keep logging to the console only
      failed = true;
      console.error(`[Logger] Disabling file sink ${filePath}:`, err);
    }
  };
}

function writeToConsole(entry: LogEntry): void {
  const line = `[${entry.scope}] ${entry.message}`;
  const args: unknown[] = entry.context ? [line, entry.context] : [line];

  switch (entry.level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly threshold: number,
    private readonly sinks: Sink[]
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`, this.threshold, this.sinks);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    for (const sink of this.sinks) {
      sink(entry);
    }
  }
}

/**
 * Create a logger for a scope
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sinks: Sink[] = [writeToConsole];
  if (options.filePath) {
    sinks.push(createFileSink(options.filePath));
  }
  return new ScopedLogger(scope, LOG_LEVELS.indexOf(options.level ?? 'info'), sinks);
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
