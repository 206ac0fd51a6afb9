/**
 * Engine Logger
 *
 * Centralized logging built on electron-log's Node.js entry.
 * Provides namespaced loggers with an in-memory buffer so hosts and tests
 * can inspect what the engine reported.
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - Namespaces for categorization (e.g., [Indexer], [Retriever])
 * - Optional file persistence
 * - In-memory buffer and subscriptions
 */

import log from 'electron-log/node';

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  id: number;
  timestamp: number;
  level: LogLevel;
  namespace: string;
  message: string;
  data?: unknown;
}

export interface LoggerConfig {
  /** Minimum level to log (default: 'debug' in dev, 'info' in prod) */
  minLevel: LogLevel;
  /** Maximum entries to keep in memory (default: 1000) */
  maxEntries: number;
  /** Whether to output to console (default: off under test) */
  consoleOutput: boolean;
  /** Write to this file when set */
  logFile?: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const IS_DEV = process.env.NODE_ENV !== 'production';
const IS_TEST = process.env.NODE_ENV === 'test';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: IS_DEV ? 'debug' : 'info',
  maxEntries: 1000,
  consoleOutput: !IS_TEST,
};

// ============================================================================
// CONFIGURE ELECTRON-LOG
// ============================================================================

log.transports.file.level = false;
log.transports.file.maxSize = 5 * 1024 * 1024; // 5MB
log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';

log.transports.console.level = DEFAULT_CONFIG.consoleOutput
  ? DEFAULT_CONFIG.minLevel
  : false;
log.transports.console.format = '[{h}:{i}:{s}] [{level}] {text}';

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class EngineLogger {
  private entries: LogEntry[] = [];
  private config: LoggerConfig = { ...DEFAULT_CONFIG };
  private listeners: Set<(entry: LogEntry) => void> = new Set();
  private nextId = 1;

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };

    const logFile = this.config.logFile;
    if (logFile) {
      log.transports.file.resolvePathFn = () => logFile;
      log.transports.file.level = this.config.minLevel;
    } else {
      log.transports.file.level = false;
    }
    log.transports.console.level = this.config.consoleOutput
      ? this.config.minLevel
      : false;
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Create a namespaced logger
   */
  createNamespace(namespace: string): NamespacedLogger {
    return new NamespacedLogger(this, namespace);
  }

  debug(namespace: string, message: string, data?: unknown): void {
    this.log('debug', namespace, message, data);
  }

  info(namespace: string, message: string, data?: unknown): void {
    this.log('info', namespace, message, data);
  }

  warn(namespace: string, message: string, data?: unknown): void {
    this.log('warn', namespace, message, data);
  }

  error(namespace: string, message: string, data?: unknown): void {
    this.log('error', namespace, message, data);
  }

  private log(
    level: LogLevel,
    namespace: string,
    message: string,
    data?: unknown
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      id: this.nextId++,
      timestamp: Date.now(),
      level,
      namespace,
      message,
      data,
    };

    this.entries.push(entry);
    if (this.entries.length > this.config.maxEntries) {
      this.entries = this.entries.slice(-this.config.maxEntries);
    }

    const formattedMessage = `[${namespace}] ${message}`;
    const logData =
      data !== undefined ? [formattedMessage, data] : [formattedMessage];

    switch (level) {
      case 'debug':
        log.debug(...logData);
        break;
      case 'info':
        log.info(...logData);
        break;
      case 'warn':
        log.warn(...logData);
        break;
      case 'error':
        log.error(...logData);
        break;
    }

    this.listeners.forEach((listener) => listener(entry));
  }

  private shouldLog(level: LogLevel): boolean {
    return (
      LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel]
    );
  }

  // ===========================================================================
  // QUERY METHODS
  // ===========================================================================

  /**
   * Get all entries, optionally filtered
   */
  getEntries(filter?: {
    level?: LogLevel;
    namespace?: string;
    since?: number;
  }): LogEntry[] {
    let result = [...this.entries];

    if (filter?.level) {
      const minPriority = LOG_LEVEL_PRIORITY[filter.level];
      result = result.filter((e) => LOG_LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.namespace) {
      result = result.filter((e) => e.namespace === filter.namespace);
    }

    if (filter?.since !== undefined) {
      const since = filter.since;
      result = result.filter((e) => e.timestamp >= since);
    }

    return result;
  }

  /**
   * Subscribe to new log entries
   */
  subscribe(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  clear(): void {
    this.entries = [];
  }

  get count(): number {
    return this.entries.length;
  }
}

// ============================================================================
// NAMESPACED LOGGER
// ============================================================================

/**
 * A logger instance bound to a specific namespace
 */
export class NamespacedLogger {
  constructor(
    private logger: EngineLogger,
    private namespace: string
  ) {}

  debug(message: string, data?: unknown): void {
    this.logger.debug(this.namespace, message, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(this.namespace, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(this.namespace, message, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(this.namespace, message, data);
  }
}

// ============================================================================
// DEFAULT INSTANCE
// ============================================================================

export const engineLogger = new EngineLogger();

/**
 * Create a namespaced logger on the default instance
 * @example
 * const log = createLogger('Indexer');
 * log.info('Ingestion started');
 */
export function createLogger(namespace: string): NamespacedLogger {
  return engineLogger.createNamespace(namespace);
}
