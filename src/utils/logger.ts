/**
 * Debug logging utility
 *
 * Provides structured logging with different levels and namespaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  namespace: string;
  message: string;
  data?: unknown;
}

export interface LoggerConfig {
  enabled?: boolean;
  level?: LogLevel;
  namespace?: string;
  prefix?: string;
  maxHistorySize?: number;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private config: Required<LoggerConfig>;
  private history: LogEntry[] = [];
  private children: Logger[] = [];

  constructor(config?: LoggerConfig) {
    this.config = {
      enabled: config?.enabled ?? false,
      level: config?.level ?? 'info',
      namespace: config?.namespace ?? 'SDK',
      prefix: config?.prefix ?? '[sound-events]',
      maxHistorySize: config?.maxHistorySize ?? 100,
    };
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Create a child logger with a sub-namespace
   */
  child(namespace: string): Logger {
    const childLogger = new Logger({
      ...this.config,
      namespace: `${this.config.namespace}:${namespace}`,
    });
    this.children.push(childLogger);
    return childLogger;
  }

  /**
   * Enable logging (propagates to children)
   */
  enable(): void {
    this.config.enabled = true;
    this.children.forEach((child) => child.enable());
  }

  /**
   * Disable logging (propagates to children)
   */
  disable(): void {
    this.config.enabled = false;
    this.children.forEach((child) => child.disable());
  }

  /**
   * Set log level (propagates to children)
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.children.forEach((child) => child.setLevel(level));
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getNamespace(): string {
    return this.config.namespace;
  }

  getHistory(): LogEntry[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.config.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      namespace: this.config.namespace,
      message,
      data,
    };

    this.history.push(entry);
    if (this.history.length > this.config.maxHistorySize) {
      this.history.shift();
    }

    this.outputToConsole(entry);
  }

  private outputToConsole(entry: LogEntry): void {
    const { timestamp, level, namespace, message, data } = entry;
    const prefix = `${this.config.prefix} [${timestamp.toISOString()}] [${namespace}]`;
    const consoleMethod = level === 'debug' ? 'log' : level;

    console[consoleMethod](prefix, message, data !== undefined ? data : '');
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Global SDK logger singleton
 * Enabled by SoundContext when constructed with `debug: true`
 */
export const SDKLogger = new Logger({
  enabled: false,
  level: 'info',
  namespace: 'SDK',
  prefix: '[sound-events]',
});
