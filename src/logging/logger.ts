/**
 * Leveled logger for the orchestrator.
 *
 * Every line goes to the console (colored with picocolors) and, when a
 * log file is configured, is appended to it as plain text:
 *
 *   [2026-01-15 09:05:03] [INFO] Processing: feature.md
 *
 * File appends are chained so lines land in call order. A failed append
 * is held and rethrown by the next `flush()`.
 *
 * @module logging/logger
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import pc from 'picocolors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Wait for pending file writes. */
  flush(): Promise<void>;
}

export interface LoggerOptions {
  /** Append plain lines to this file. */
  logFile?: string;
  /** Echo to the console (default true). */
  console?: boolean;
  /** Emit debug lines (default false). */
  verbose?: boolean;
  clock?: () => Date;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Build the plain-text line written to the log file.
 */
export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `[${formatTimestamp(at)}] [${LEVEL_TAGS[level]}] ${message}`;
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class OrchestratorLogger implements Logger {
  private readonly logFile?: string;
  private readonly toConsole: boolean;
  private readonly verbose: boolean;
  private readonly clock: () => Date;
  private pending: Promise<void> = Promise.resolve();
  private writeError?: Error;
  private dirEnsured = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile;
    this.toConsole = options.console ?? true;
    this.verbose = options.verbose ?? false;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(message: string): void {
    if (this.verbose) this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.writeError) {
      const error = this.writeError;
      this.writeError = undefined;
      throw error;
    }
  }

  private write(level: LogLevel, message: string): void {
    const at = this.clock();

    if (this.toConsole) {
      const colored = `${pc.dim(`[${formatTimestamp(at)}]`)} ${LEVEL_COLORS[level](`[${LEVEL_TAGS[level]}]`)} ${message}`;
      if (level === 'error') console.error(colored);
      else if (level === 'warn') console.warn(colored);
      else console.log(colored);
    }

    const logFile = this.logFile;
    if (!logFile) return;

    const line = formatLogLine(level, message, at) + '\n';
    this.pending = this.pending
      .then(async () => {
        if (!this.dirEnsured) {
          await mkdir(dirname(logFile), { recursive: true });
          this.dirEnsured = true;
        }
        await appendFile(logFile, line, 'utf-8');
      })
      .catch((err: unknown) => {
        this.writeError ??= err instanceof Error ? err : new Error(String(err));
      });
  }
}

/**
 * Create a logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new OrchestratorLogger(options);
}
