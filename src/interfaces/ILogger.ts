/**
 * @fileoverview Interface for logging abstraction.
 * 
 * Mirrors the public API of `ComponentLogger` so services can take a logger
 * through their constructor and tests can pass a stub instead.
 * 
 * @module interfaces/ILogger
 */

/** Log levels, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for a component-scoped logger.
 * 
 * @example
 * ```typescript
 * class StatusPoller {
 *   constructor(private readonly log: ILogger) {}
 *   
 *   poll(): void {
 *     this.log.info('Polling status');
 *     this.log.debug('Details', { repository: '/work/repo' });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   * 
   * @param message - Log message
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  /** Log at info level. */
  info(message: string, data?: unknown): void;

  /** Log at warn level. */
  warn(message: string, data?: unknown): void;

  /** Log at error level. */
  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;

  /** Set the level threshold. */
  setLevel(level: LogLevel): void;

  /** Get the current level threshold. */
  getLevel(): LogLevel;
}
