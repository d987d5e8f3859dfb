/**
 * Structured logging for geosync packages.
 *
 * A small structured logger with levels, JSON output, module prefixes and a
 * global debug toggle. Silent unless a handler, JSON output or debug mode is
 * configured.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger interface that consumers can implement */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format on the console */
  readonly json?: boolean;
}

/** What a component accepts for its `logger` option */
export type LoggerOption = Logger | LoggerConfig | false;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all geosync loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

function consoleLine(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `${timestamp} ${entry.level.toUpperCase()}[${entry.module}] ${entry.message}${dataStr}`;
}

/**
 * Structured logger for geosync modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'hub-client', level: 'debug', json: true });
 *
 * log.info('Iterating space', { spaceId: 'abc' });
 *
 * const end = log.time('write-batch');
 * // ... do work ...
 * end({ features: 120 });
 * ```
 */
export class GeoSyncLogger implements Logger {
  private readonly config: Required<Omit<LoggerConfig, 'handler' | 'json'>> &
    Pick<LoggerConfig, 'handler' | 'json'>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'geosync',
      handler: config.handler,
      json: config.json,
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): GeoSyncLogger {
    return new GeoSyncLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json || globalDebug) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(this.config.json ? JSON.stringify(entry) : consoleLine(entry));
    }
  }
}

/** Factory function to create a GeoSyncLogger */
export function createLogger(config?: LoggerConfig): GeoSyncLogger {
  return new GeoSyncLogger(config);
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Resolve a component's `logger` option into a Logger.
 * `false` silences the component; a config object builds a logger for `module`.
 */
export function resolveLogger(option: LoggerOption | undefined, module: string): Logger {
  if (option === false) return noopLogger;
  if (option === undefined) return createLogger({ module });
  if (isLogger(option)) return option;
  return createLogger({ ...option, module });
}

function isLogger(option: Logger | LoggerConfig): option is Logger {
  return 'info' in option;
}
