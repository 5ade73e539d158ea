export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  scope?: string;
  [key: string]: unknown; // Additional context
}

export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  sink?: LogSink; // defaults to stderr so stdout stays parseable
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

export interface ScopedLogger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  time(label: string): () => void;
}

// Returns a stop function that logs the elapsed time at debug level
function startTimer(logger: ScopedLogger, label: string): () => void {
  const start = performance.now();
  return () => {
    const duration = performance.now() - start;
    logger.debug(`${label} completed`, { durationMs: Math.round(duration) });
  };
}

export class Logger implements ScopedLogger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.sink ?? process.stderr;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private format(level: LogLevel, msg: string, scope?: string, context?: LogContext): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(scope ? { scope } : {}),
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const scopeStr = scope ? ` (${scope})` : '';
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${entry.ts}] ${levelStr}${scopeStr} ${msg}${contextStr}`;
  }

  log(level: LogLevel, msg: string, context?: LogContext, scope?: string): void {
    if (!this.isEnabled(level)) return;
    this.sink.write(this.format(level, msg, scope, context) + '\n');
  }

  debug(msg: string, context?: LogContext): void {
    this.log('debug', msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.log('info', msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.log('warn', msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.log('error', msg, context);
  }

  // Child logger tagged with a scope, e.g. 'score' or 'config'
  child(scope: string, context: LogContext = {}): ScopedLogger {
    return new ChildLogger(this, scope, context);
  }

  // Time an operation
  time(label: string): () => void {
    return startTimer(this, label);
  }
}

class ChildLogger implements ScopedLogger {
  constructor(
    private parent: Logger,
    private scope: string,
    private context: LogContext
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.log('debug', msg, { ...this.context, ...context }, this.scope);
  }

  info(msg: string, context?: LogContext): void {
    this.parent.log('info', msg, { ...this.context, ...context }, this.scope);
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.log('warn', msg, { ...this.context, ...context }, this.scope);
  }

  error(msg: string, context?: LogContext): void {
    this.parent.log('error', msg, { ...this.context, ...context }, this.scope);
  }

  time(label: string): () => void {
    return startTimer(this, label);
  }
}

/**
 * --quiet wins over --verbose; either wins over the configured level.
 */
export function resolveLogLevel(configured: LogLevel, flags: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (flags.quiet) return 'error';
  if (flags.verbose) return 'debug';
  return configured;
}

// Global logger instance
let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Default logger for early use
    globalLogger = new Logger({ level: 'info', json: false });
  }
  return globalLogger;
}
