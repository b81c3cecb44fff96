/**
 * Tessera - Console Logger
 *
 * Leveled logger whose lines carry a scope path (`tessera:model`, `tessera:tools`).
 * Child loggers extend the path and share their parent's level, so `setLevel`
 * on the root retunes every component at once.
 */

import type { Logger } from '../sdk/types.js';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type EmittingLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const ANSI: Record<EmittingLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const ANSI_RESET = '\x1b[0m';

/**
 * Receives each rendered line. `meta` lines belong to the entry before them.
 */
export type LogSink = (level: EmittingLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written (default info) */
  level?: LogLevel;

  /** ANSI-coloured level tags (default: when stdout is a TTY) */
  colors?: boolean;

  /** Prefix each line with the time of day (default true) */
  timestamps?: boolean;

  /** Root scope of the scope path (default "tessera") */
  scope?: string;

  /** Where lines go (default: console, by severity) */
  sink?: LogSink;
}

export interface LogEntry {
  level: EmittingLevel;
  scope: readonly string[];
  message: string;
  meta?: Record<string, unknown>;
  time?: Date;
}

/**
 * Render one entry as its header line plus indented JSON meta lines.
 */
export function formatLogEntry(entry: LogEntry, colors = false): string[] {
  const tag = entry.level.toUpperCase().padEnd(5);
  const header = [
    entry.time ? `[${entry.time.toISOString().slice(11, 23)}]` : undefined,
    colors ? `${ANSI[entry.level]}${tag}${ANSI_RESET}` : tag,
    `${entry.scope.join(':')}:`,
    entry.message,
  ]
    .filter((part): part is string => part !== undefined)
    .join(' ');

  if (!entry.meta || Object.keys(entry.meta).length === 0) {
    return [header];
  }
  const meta = JSON.stringify(entry.meta, null, 2)
    .split('\n')
    .map(line => `  ${line}`);
  return [header, ...meta];
}

const consoleSink: LogSink = (level, line) => {
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

/**
 * Settings shared by a logger and every child derived from it.
 */
export interface LoggerSettings {
  threshold: number;
  colors: boolean;
  timestamps: boolean;
  sink: LogSink;
}

/**
 * ConsoleLogger - Scoped structured logger.
 */
export class ConsoleLogger implements Logger {
  private readonly settings: LoggerSettings;
  private readonly scope: readonly string[];

  constructor(options: LoggerOptions = {}, parent?: { settings: LoggerSettings; scope: readonly string[] }) {
    this.settings = parent?.settings ?? {
      threshold: SEVERITY[options.level ?? 'info'],
      colors: options.colors ?? process.stdout.isTTY === true,
      timestamps: options.timestamps ?? true,
      sink: options.sink ?? consoleSink,
    };
    this.scope = parent?.scope ?? [options.scope ?? 'tessera'];
  }

  /**
   * A logger writing under `scope` below this one. Settings stay shared.
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({}, { settings: this.settings, scope: [...this.scope, scope] });
  }

  setLevel(level: LogLevel): void {
    this.settings.threshold = SEVERITY[level];
  }

  isEnabled(level: EmittingLevel): boolean {
    return SEVERITY[level] >= this.settings.threshold;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  startTimer(label: string): () => void {
    const start = performance.now();
    return (): void => {
      this.debug(`${label} completed`, { durationMs: Math.round(performance.now() - start) });
    };
  }

  private write(level: EmittingLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const { colors, timestamps, sink } = this.settings;
    const lines = formatLogEntry(
      { level, scope: this.scope, message, meta, time: timestamps ? new Date() : undefined },
      colors
    );
    for (const line of lines) {
      sink(level, line);
    }
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options?: LoggerOptions): ConsoleLogger {
  return new ConsoleLogger(options);
}

/**
 * Logger used by SDK components constructed without one: warnings and errors only.
 */
export function defaultLogger(): Logger {
  return new ConsoleLogger({ level: 'warn' });
}
