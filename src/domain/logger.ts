/**
 * Structured JSON logger for zipcast
 *
 * IMPORTANT: All logs go to stderr because stdout is reserved for the forecast output
 */

import type { PipelineState } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'error') {
    this.minLevel = minLevel;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

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

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  /**
   * Log a pipeline state transition
   */
  logTransition(
    from: PipelineState,
    to: PipelineState,
    runId?: string
  ): void {
    this.debug('Pipeline transition', { runId, from, to });
  }

  /**
   * Log upstream API call
   */
  logUpstreamCall(
    upstreamUrl: string,
    upstreamStatus: number,
    latencyMs: number,
    runId?: string
  ): void {
    this.debug('Upstream API call', {
      runId,
      upstreamUrl,
      upstreamStatus,
      latencyMs,
    });
  }
}

// Singleton logger instance
const logger = new Logger();

export { logger };
