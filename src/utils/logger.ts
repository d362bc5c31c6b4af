/**
 * Log level, from quietest to loudest. Each level includes everything above it.
 * */
export type LogLevel = 'silent' | 'error' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'info', 'debug'];

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, info: 2, debug: 3 };

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Simple logging utility with configurable verbosity and an optional scope prefix.
 *
 * @example
 * ```typescript
 * const logger = new Logger('info', 'data');
 * logger.info('Document created', { path: 'p/o/r/1' });
 * // [INFO] [data] Document created { path: 'p/o/r/1' }
 * ```
 */
export class Logger {
  /**
   * @param level - Logging level (default: `'info'`)
   * @param scope - Optional tag printed after the level
   */
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope?: string,
  ) {}

  /** Logger with the same level and a different scope. */
  child(scope: string): Logger {
    return new Logger(this.level, scope);
  }

  error(msg: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    console.error(this.format('ERROR', msg), meta ?? '');
  }

  /** Warnings share the `error` threshold so they survive a quiet `error` level. */
  warn(msg: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    console.warn(this.format('WARN', msg), meta ?? '');
  }

  /**
   * Log an info message. Outputs when level is `'info'` or `'debug'`.
   * @param msg - Message to log
   * @param meta - Optional metadata object
   */
  info(msg: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    console.log(this.format('INFO', msg), meta ?? '');
  }

  /**
   * Log a debug message. Outputs only if level is `'debug'`.
   * @param msg - Message to log
   * @param meta - Optional metadata object
   */
  debug(msg: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.log(this.format('DEBUG', msg), meta ?? '');
  }

  private enabled(at: Exclude<LogLevel, 'silent'>): boolean {
    return RANK[this.level] >= RANK[at];
  }

  private format(tag: string, msg: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${msg}` : `[${tag}] ${msg}`;
  }
}
