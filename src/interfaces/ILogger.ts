/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so that components can take a
 * logger by injection and tests can pass sinon stubs instead.
 *
 * @module interfaces/ILogger
 */

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class OperationQueue {
 *   constructor(private readonly log: ILogger = Logger.for('queue')) {}
 *
 *   pump(): void {
 *     this.log.debug('Pumping', { ready: 2 });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
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

  setLevel(level: 'debug' | 'info' | 'warn' | 'error'): void;

  getLevel(): string;
}
