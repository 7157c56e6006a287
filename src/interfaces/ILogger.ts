/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so components can take a logger
 * through their constructor and tests can hand in a sinon stub instead.
 *
 * @module interfaces/ILogger
 */

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly log: ILogger) {}
 *
 *   doWork(): void {
 *     this.log.info('Starting work');
 *     this.log.debug('Details', { step: 1 });
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

  info(message: string, data?: unknown): void;

  warn(message: string, data?: unknown): void;

  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;
}
