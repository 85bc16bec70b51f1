import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { SignalConfig } from '../config/schema.js';
import type { LogLevel, LogEntry, LogContext, SignalEvent } from './events.js';

export interface LoggerOptions {
  /** Directory for JSON-lines log files; `null` disables file output. */
  logDir: string | null;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to the console (stderr). */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Leveled logger writing human-readable lines to stderr and JSON lines to
 * `<logDir>/<source>.log`. Nothing is written to stdout: under the stdio
 * transport stdout carries the MCP stream.
 */
export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string | null;
  private initPromise: Promise<unknown> | null = null;
  private fileErrorReported = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? null,
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    this.logFile = this.opts.logDir ? join(this.opts.logDir, `${this.opts.source}.log`) : null;
  }

  get level(): LogLevel {
    return this.opts.level;
  }

  private async ensureDir(dir: string): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dir, { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  private formatConsole(entry: LogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [entry.eventId ?? null, entry.service ?? null].filter(Boolean).join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      console.error(this.formatConsole(entry));
    }

    if (!this.logFile || !this.opts.logDir) return;
    try {
      await this.ensureDir(this.opts.logDir);
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      // Report once; a broken log file must not take the server down.
      if (!this.fileErrorReported) {
        this.fileErrorReported = true;
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`Log file ${this.logFile} is not writable: ${msg}`);
      }
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: SignalEvent, level: LogLevel = 'info'): void {
    const eventId = 'eventId' in event && event.eventId ? event.eventId : undefined;
    void this.writeEntry(this.buildEntry(level, event.type, { eventId, data: { ...event } }));
  }

  /**
   * Create a logger sharing this one's settings under another source name.
   */
  child(source: string): Logger {
    return new Logger({ ...this.opts, source });
  }
}

/**
 * Build a logger from the `logging` section of the runtime config.
 */
export function createLogger(logging: SignalConfig['logging'], source: string): Logger {
  return new Logger({
    source,
    level: logging.level,
    console: logging.console,
    logDir: logging.logDir ?? null,
  });
}
