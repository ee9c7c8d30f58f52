/**
 * @fileoverview Interface for configuration access.
 *
 * Lets the logger and the runtime configuration loader read settings without
 * knowing whether they come from an object literal or the environment.
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Read-only access to sectioned configuration values.
 *
 * @example
 * ```typescript
 * const limit = provider.getConfig('queue', 'maxConcurrentOperations', 4);
 * const debugRetry = provider.getConfig('logging', 'debug.retry', false);
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   *
   * @param section - Configuration section (`queue`, `timers`, `logging`, ...)
   * @param key - Key within the section; dots address nested values
   * @param defaultValue - Returned when the value is not set
   */
  getConfig<T>(section: string, key: string, defaultValue: T): T;
}
