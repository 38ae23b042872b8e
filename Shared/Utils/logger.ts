/**
 * Diagnostic logger for the Tally packages.
 *
 * Contexts nest by `child()`: the root is `tally`, the calculator uses
 * `tally:log-store`, `tally:session` and `tally:triangle`. Lines go to stderr
 * by default; stdout belongs to the calculator dialogue.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

/** Receives one formatted line per emitted message */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => console.error(line);

export interface LoggerOptions {
  /** Level used when LOG_LEVEL is unset or invalid (default: 'info') */
  fallbackLevel?: LogLevel;
  /** Where lines go (default: stderr via console.error); children share it */
  sink?: LogSink;
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private sink: LogSink;

  constructor(context: string = 'tally', options: LoggerOptions = {}) {
    this.context = context;
    this.sink = options.sink ?? stderrSink;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : options.fallbackLevel ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private emit(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.emit('error', message, data);
  }

  /**
   * `tally` + `session` -> `tally:session`, at the parent's current level
   * and writing to the parent's sink.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`, { sink: this.sink });
    child.level = this.level;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Re-read LOG_LEVEL, e.g. after a .env file was loaded.
   * An unset or invalid value keeps the current level.
   */
  reloadLevel(): void {
    const envLevel = process.env.LOG_LEVEL;
    if (isValidLogLevel(envLevel)) {
      this.level = envLevel;
    }
  }
}

/**
 * Default logger instance.
 * Falls back to 'warn' so info chatter stays out of the interactive prompt.
 */
export const logger = new Logger('tally', { fallbackLevel: 'warn' });
