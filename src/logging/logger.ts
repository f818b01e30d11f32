/**
 * Structured JSON Logger
 *
 * Every entry is a JSON object carrying the run and session context. Entries
 * fan out to sinks: a size-rotated log file that keeps the full diagnostic
 * detail, and a console sink that only shows warnings and errors so the
 * interactive prompt stays clean.
 */

import fs from 'fs';
import path from 'path';
import type { Logger } from '../core/types.js';
import { TabularAgentError } from '../core/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  channel?: string;
  run_id?: string;
  session_id?: string;
  tool?: string;
  duration_ms?: number;
  error?: ErrorMeta;
  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry, line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  channel?: string;
  runId?: string;
  sinks?: LogSink[];
  pretty?: boolean;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// =============================================================================
// SINKS
// =============================================================================

export interface RotatingFileSinkOptions {
  file: string;
  maxBytes?: number;
  backups?: number;
}

/**
 * Appends JSON lines to a file, rolling it over to `<file>.1 … <file>.N`
 * once it would grow past `maxBytes`.
 */
export class RotatingFileSink implements LogSink {
  readonly file: string;
  private readonly maxBytes: number;
  private readonly backups: number;
  private size: number;

  constructor(options: RotatingFileSinkOptions) {
    this.file = options.file;
    this.maxBytes = options.maxBytes ?? 5_000_000;
    this.backups = options.backups ?? 5;

    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    this.size = fs.existsSync(this.file) ? fs.statSync(this.file).size : 0;
  }

  write(_entry: LogEntry, line: string): void {
    const data = `${line}\n`;
    const bytes = Buffer.byteLength(data, 'utf8');

    try {
      if (this.size > 0 && this.size + bytes > this.maxBytes) {
        this.rotate();
      }
      fs.appendFileSync(this.file, data, 'utf8');
      this.size += bytes;
    } catch (error) {
      process.stderr.write(`log sink ${this.file} failed: ${errorMeta(error).message}\n`);
    }
  }

  private rotate(): void {
    if (this.backups < 1) {
      fs.truncateSync(this.file, 0);
      this.size = 0;
      return;
    }

    const oldest = `${this.file}.${this.backups}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.backups - 1; i >= 1; i--) {
      const from = `${this.file}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.file}.${i + 1}`);
      }
    }
    fs.renameSync(this.file, `${this.file}.1`);
    this.size = 0;
  }
}

/**
 * Prints `LEVEL: message` for entries at or above `minLevel`.
 */
export class ConsoleSink implements LogSink {
  private readonly threshold: number;

  constructor(
    minLevel: LogLevel = 'warn',
    private readonly print: (line: string) => void = line => console.error(line)
  ) {
    this.threshold = LOG_LEVELS[minLevel];
  }

  write(entry: LogEntry): void {
    if (LOG_LEVELS[entry.level] < this.threshold) return;
    const detail = entry.error ? ` (${entry.error.message})` : '';
    this.print(`${entry.level.toUpperCase()}: ${entry.message}${detail}`);
  }
}

/**
 * Keeps entries in memory. Used by tests and by callers that want to inspect
 * what a component reported.
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// LOGGER
// =============================================================================

export class StructuredLogger implements Logger {
  private level: number;
  private context: Partial<LogEntry>;
  private sinks: LogSink[];
  private pretty: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = LOG_LEVELS[options.level ?? 'info'];
    this.pretty = options.pretty ?? false;
    this.sinks = options.sinks ?? [new ConsoleSink('warn')];
    this.context = {
      channel: options.channel,
      run_id: options.runId,
    };
  }

  child(additionalContext: Partial<LogEntry>): StructuredLogger {
    const logger = new StructuredLogger({
      level: this.getLevelName(),
      pretty: this.pretty,
      sinks: this.sinks,
    });
    logger.context = { ...this.context, ...additionalContext };
    return logger;
  }

  private getLevelName(): LogLevel {
    for (const [name, value] of Object.entries(LOG_LEVELS)) {
      if (value === this.level && isLogLevel(name)) return name;
    }
    return 'info';
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...meta,
    };

    // Clean undefined values
    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.pretty
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    for (const sink of this.sinks) {
      sink.write(entry, output);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  // Convenience methods for common events
  toolCalled(toolName: string, durationMs: number, success: boolean): void {
    this.debug('tool_called', {
      tool: toolName,
      duration_ms: durationMs,
      success,
    });
  }

  failure(message: string, error: unknown, meta?: Record<string, unknown>): void {
    this.error(message, { ...meta, error: errorMeta(error) });
  }
}

export interface ErrorMeta {
  code: string;
  message: string;
  /** Present for the agent's own error kinds. */
  kind?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  stack?: string;
}

export function errorMeta(error: unknown): ErrorMeta {
  if (error instanceof TabularAgentError) {
    return {
      code: error.code,
      message: error.message,
      kind: error.kind,
      retryable: error.retryable,
      details: error.details,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : error.name;
    return { code, message: error.message, stack: error.stack };
  }
  return { code: 'UNKNOWN', message: String(error) };
}

// =============================================================================
// FACTORIES
// =============================================================================

export interface FileLoggerOptions {
  dir: string;
  level?: LogLevel;
  console?: boolean;
  runId?: string;
}

/**
 * Logger writing everything at `level` and above to `<dir>/<channel>.log`,
 * echoing warnings and errors to stderr.
 */
export function createFileLogger(channel: string, options: FileLoggerOptions): StructuredLogger {
  const sinks: LogSink[] = [new RotatingFileSink({ file: path.join(options.dir, `${channel}.log`) })];
  if (options.console ?? true) {
    sinks.push(new ConsoleSink('warn'));
  }
  return new StructuredLogger({
    level: options.level ?? 'debug',
    channel,
    runId: options.runId,
    sinks,
  });
}

export function createLogger(options: LoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}
