/**
 * @fileoverview Service tokens for dependency injection container.
 *
 * Provides Symbol-based tokens for type-safe service registration and resolution
 * in the ServiceContainer. Each token corresponds to an interface in src/interfaces/
 * or to a value built by the composition root.
 *
 * @module core/tokens
 */

// ─── Infrastructure ─────────────────────────────────────────────────────────

/**
 * Token for IConfigProvider service.
 * Provides raw configuration values by section and key.
 */
export const IConfigProvider = Symbol('IConfigProvider');

/**
 * Token for the root Logger.
 * Component loggers are still created through Logger.for().
 */
export const ILogger = Symbol('ILogger');

/**
 * Token for the validated RuntimeConfig.
 */
export const RuntimeConfig = Symbol('RuntimeConfig');

// ─── Execution ──────────────────────────────────────────────────────────────

/**
 * Token for the serial "main" ExecutionContext.
 */
export const MainContext = Symbol('MainContext');

/**
 * Token for the background ExecutionContext used to start queued operations.
 */
export const BackgroundContext = Symbol('BackgroundContext');

/**
 * Token for ITimerFactory service.
 * Provides deadline and wall-clock timers for delay and retry.
 */
export const ITimerFactory = Symbol('ITimerFactory');

// ─── Scheduling ─────────────────────────────────────────────────────────────

/**
 * Token for IExclusivityController service.
 * One controller per container; there is no process-wide instance.
 */
export const IExclusivityController = Symbol('IExclusivityController');

/**
 * Token for IOperationQueue service.
 * The default work queue, sized from RuntimeConfig.
 */
export const IOperationQueue = Symbol('IOperationQueue');
