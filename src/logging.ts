// File logging for trellis
// Entries are buffered and appended to one file per session; an empty path turns logging off

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Env } from './env.ts';
import { ensureError } from './errors.ts';

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export const LOG_FORMATS = ['json', 'text', 'structured'] as const;
export type LogFormat = typeof LOG_FORMATS[number];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
}

export interface LoggerOptions {
  // Empty disables logging
  logFile?: string;
  level?: LogLevel;
  format?: LogFormat;
  includeTimestamp?: boolean;
  // Entries held before a write
  bufferSize?: number;
  // ms between timed flushes, 0 for none
  flushInterval?: number;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  bytesWritten: number;
  buffered: number;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

type EntryFormatter = (entry: LogEntry, includeTimestamp: boolean) => string;

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    source: entry.source,
    message: entry.message,
    context: entry.context,
    error: entry.error ? { name: entry.error.name, message: entry.error.message, stack: entry.error.stack } : undefined,
  });
}

function formatText(entry: LogEntry, includeTimestamp: boolean): string {
  const parts: string[] = [];
  if (includeTimestamp) {
    parts.push(`[${entry.timestamp.toISOString()}]`);
  }
  parts.push(entry.level.padEnd(5));
  if (entry.source) {
    parts.push(`[${entry.source}]`);
  }
  let line = `${parts.join(' ')} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` | ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += ` | ERROR: ${entry.error.message}`;
  }
  return line;
}

function formatStructured(entry: LogEntry, includeTimestamp: boolean): string {
  let line = includeTimestamp ? `${entry.timestamp.toISOString()} [${entry.level}] ` : `[${entry.level}] `;
  if (entry.source) {
    line += `${entry.source}: `;
  }
  line += entry.message;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ' | ' + Object.entries(entry.context)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(', ');
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n  Stack: ${entry.error.stack}`;
    }
  }
  return line;
}

const FORMATTERS: Record<LogFormat, EntryFormatter> = {
  json: formatJson,
  text: formatText,
  structured: formatStructured,
};

export class Logger {
  private readonly _logFile: string;
  private readonly _format: LogFormat;
  private readonly _includeTimestamp: boolean;
  private readonly _bufferSize: number;
  private readonly _flushInterval: number;
  private readonly _sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  private _level: LogLevel;
  private _buffer: LogEntry[] = [];
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _state: 'new' | 'open' | 'disabled' | 'closed' = 'new';
  private _stats: LoggerStats = {
    totalEntries: 0,
    entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    bytesWritten: 0,
    buffered: 0,
  };

  constructor(options: LoggerOptions = {}) {
    this._logFile = options.logFile?.trim() ?? '';
    this._level = options.level ?? 'INFO';
    this._format = options.format ?? 'structured';
    this._includeTimestamp = options.includeTimestamp ?? true;
    this._bufferSize = Math.max(1, options.bufferSize ?? 100);
    this._flushInterval = options.flushInterval ?? 1000;
  }

  get sessionId(): string {
    return this._sessionId;
  }

  /**
   * Path being written, once the logger is open
   */
  get logFile(): string | undefined {
    return this._state === 'open' ? this._logFile : undefined;
  }

  /**
   * Create the log directory and write the session header. Called on first use.
   */
  initialize(): void {
    if (this._state !== 'new') {
      return;
    }
    if (this._logFile === '') {
      this._state = 'disabled';
      return;
    }

    try {
      mkdirSync(dirname(this._logFile), { recursive: true });
    } catch (error) {
      this._disable(error);
      return;
    }
    this._state = 'open';

    if (this._flushInterval > 0) {
      this._flushTimer = setInterval(() => this._flushOrDisable(), this._flushInterval);
      // A pending flush must not keep the process alive
      this._flushTimer.unref();
    }
    this._append({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: { sessionId: this._sessionId, logFile: this._logFile },
      source: 'Logger',
    });
  }

  isEnabled(level: LogLevel): boolean {
    return this._state !== 'disabled' && this._state !== 'closed' &&
      LOG_LEVELS[level] >= LOG_LEVELS[this._level];
  }

  formatEntry(entry: LogEntry): string {
    return FORMATTERS[this._format](entry, this._includeTimestamp) + '\n';
  }

  private _append(entry: LogEntry): void {
    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;
    this._buffer.push(entry);
    this._stats.buffered = this._buffer.length;

    if (this._buffer.length >= this._bufferSize) {
      this._flushOrDisable();
    }
  }

  // Logging must never fail the caller; an unwritable file turns the logger off
  private _flushOrDisable(): void {
    try {
      this.flush();
    } catch (error) {
      this._disable(error);
    }
  }

  private _disable(error: unknown): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    this._buffer = [];
    this._stats.buffered = 0;
    this._state = 'disabled';
    console.error(`Cannot write log file ${this._logFile}: ${ensureError(error).message}; logging disabled`);
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    this.initialize();
    if (!this.isEnabled(level)) {
      return;
    }
    this._append({ timestamp: new Date(), level, message, context, error, source });
  }

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  /**
   * Append buffered entries to the file. Entries stay buffered if the write fails.
   */
  flush(): void {
    if (this._buffer.length === 0 || this._state !== 'open') {
      return;
    }
    const entries = this._buffer.splice(0);
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      appendFileSync(this._logFile, content, 'utf8');
    } catch (error) {
      this._buffer.unshift(...entries);
      throw new Error(`Failed to write to log file: ${ensureError(error).message}`);
    }
    this._stats.bytesWritten += Buffer.byteLength(content, 'utf8');
    this._stats.buffered = 0;
  }

  setLevel(level: LogLevel): void {
    this._level = level;
  }

  getLevel(): LogLevel {
    return this._level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  /**
   * Write the session trailer and stop the flush timer. Later entries are dropped.
   */
  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    if (this._state !== 'open') {
      return;
    }
    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: { sessionId: this._sessionId, totalEntries: this._stats.totalEntries },
      source: 'Logger',
    });
    this._flushOrDisable();
    this._state = 'closed';
  }
}

function levelFromEnv(): LogLevel | undefined {
  const level = Env.get('TRELLIS_LOG_LEVEL')?.toUpperCase();
  return level && isLogLevel(level) ? level : undefined;
}

let globalLogger: Logger | undefined;

/**
 * New logger, with TRELLIS_LOG_LEVEL and TRELLIS_LOG_FILE as defaults
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = new Logger({
    level: levelFromEnv(),
    logFile: Env.get('TRELLIS_LOG_FILE') ?? '',
    ...options,
  });
  logger.initialize();
  return logger;
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Replace the global logger. The previous one is closed.
 */
export function setGlobalLogger(logger: Logger): void {
  if (globalLogger && globalLogger !== logger) {
    globalLogger.close();
  }
  globalLogger = logger;
}

// Logger bound to a component, which becomes the entry source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

/**
 * Resolves the global logger on every call, so module-level loggers
 * follow a later setGlobalLogger().
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
    isTraceEnabled: () => getGlobalLogger().isEnabled('TRACE'),
    isDebugEnabled: () => getGlobalLogger().isEnabled('DEBUG'),
  };
}
