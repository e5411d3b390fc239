/**
 * Structured logger used throughout the operator
 */
export interface OperatorLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log informational messages
   */
  info(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log warning messages
   */
  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Log fatal error messages (most severe)
   */
  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): OperatorLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Configuration options for the operator logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold
   */
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false in production)
   */
  pretty?: boolean;

  /**
   * Output destination (default: stdout)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Context bound to a logger
 */
export interface LoggerContext {
  component?: string;
  /** `namespace/name` of the IssueRequest being reconciled */
  resourceId?: string;
  [key: string]: unknown;
}
