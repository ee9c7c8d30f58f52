/**
 * @fileoverview Composition Root - DI container wiring for the library.
 *
 * Creates a {@link ServiceContainer} with the default service implementations
 * registered. This is the single place where concrete classes meet their
 * interfaces; the exclusivity controller and the work queue live exactly as
 * long as the container that created them.
 *
 * ## Dependency Graph
 *
 * ```
 * IConfigProvider        ──→ EnvConfigProvider | caller's provider (singleton)
 *   └─ used by: Logger, loadRuntimeConfig
 *
 * ILogger                ──→ Logger                  (singleton)
 *
 * RuntimeConfig          ──→ loadRuntimeConfig()     (singleton, uses IConfigProvider)
 *
 * MainContext            ──→ SerialContext('main')   (singleton)
 * BackgroundContext      ──→ MacrotaskContext        (singleton)
 *
 * ITimerFactory          ──→ SystemTimerFactory      (singleton, uses RuntimeConfig)
 *
 * IExclusivityController ──→ ExclusivityController   (singleton)
 *
 * IOperationQueue        ──→ OperationQueue          (singleton, uses RuntimeConfig,
 *                                                      BackgroundContext)
 * ```
 *
 * @module composition
 */

import { ServiceContainer } from './core/container';
import * as Tokens from './core/tokens';
import { Logger, LogSink } from './core/logger';
import { EnvConfigProvider, RuntimeConfig, loadRuntimeConfig } from './core/config';
import { MacrotaskContext, SerialContext } from './context/executionContext';
import { SystemTimerFactory, ITimerFactory } from './future/timers';
import { ExclusivityController } from './operations/exclusivityController';
import { OperationQueue } from './operations/operationQueue';
import type { IConfigProvider } from './interfaces/IConfigProvider';
import type { ExecutionContext } from './interfaces/IExecutionContext';
import type { IExclusivityController } from './interfaces/IExclusivityController';
import type { IOperationQueue } from './interfaces/IOperationQueue';

const log = Logger.for('init');

export interface ContainerOptions {
  /** Defaults to {@link EnvConfigProvider} over `process.env` */
  configProvider?: IConfigProvider;
  /** Replaces the logger's output sink */
  logSink?: LogSink;
}

/**
 * Services most callers need, resolved in one go.
 */
export interface CoreServices {
  config: RuntimeConfig;
  mainContext: ExecutionContext;
  backgroundContext: ExecutionContext;
  timers: ITimerFactory;
  exclusivity: IExclusivityController;
  queue: IOperationQueue;
}

/**
 * Create and wire the DI container.
 *
 * The logger is initialized eagerly so that component loggers created
 * afterwards write through the configured sink. Everything else is built on
 * first resolve.
 *
 * @throws {ConfigValidationError} if the provider yields invalid settings
 */
export function createContainer(options: ContainerOptions = {}): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Configuration ───────────────────────────────────────────────────
  container.registerSingleton<IConfigProvider>(
    Tokens.IConfigProvider,
    () => options.configProvider ?? new EnvConfigProvider(),
  );

  container.registerSingleton<RuntimeConfig>(
    Tokens.RuntimeConfig,
    (c) => loadRuntimeConfig(c.resolve<IConfigProvider>(Tokens.IConfigProvider)),
  );

  // ─── Logger ──────────────────────────────────────────────────────────
  // Logger is a singleton managed by its own static state.
  // We register a factory that initializes it (idempotent) and wires the
  // config provider so logging config is read through the DI layer.
  container.registerSingleton<Logger>(
    Tokens.ILogger,
    (c) => {
      const logger = Logger.initialize();
      if (options.logSink) {
        logger.setSink(options.logSink);
      }
      logger.setConfigProvider(c.resolve<IConfigProvider>(Tokens.IConfigProvider));
      return logger;
    },
  );

  // ─── Execution Contexts ──────────────────────────────────────────────
  container.registerSingleton<ExecutionContext>(
    Tokens.MainContext,
    () => new SerialContext('main'),
  );

  container.registerSingleton<ExecutionContext>(
    Tokens.BackgroundContext,
    () => new MacrotaskContext('background'),
  );

  // ─── Timers ──────────────────────────────────────────────────────────
  container.registerSingleton<ITimerFactory>(
    Tokens.ITimerFactory,
    (c) => {
      const config = c.resolve<RuntimeConfig>(Tokens.RuntimeConfig);
      return new SystemTimerFactory(config.timers.wallClockCheckIntervalMs);
    },
  );

  // ─── Scheduling ──────────────────────────────────────────────────────
  container.registerSingleton<IExclusivityController>(
    Tokens.IExclusivityController,
    () => new ExclusivityController(),
  );

  container.registerSingleton<IOperationQueue>(
    Tokens.IOperationQueue,
    (c) => {
      const config = c.resolve<RuntimeConfig>(Tokens.RuntimeConfig);
      return new OperationQueue({
        name: 'default',
        maxConcurrentOperationCount: config.queue.maxConcurrentOperations,
        context: c.resolve<ExecutionContext>(Tokens.BackgroundContext),
      });
    },
  );

  container.resolve<Logger>(Tokens.ILogger);
  log.debug('Container created');

  return container;
}

/**
 * Resolve the {@link CoreServices} of a container.
 */
export function resolveServices(container: ServiceContainer): CoreServices {
  return {
    config: container.resolve<RuntimeConfig>(Tokens.RuntimeConfig),
    mainContext: container.resolve<ExecutionContext>(Tokens.MainContext),
    backgroundContext: container.resolve<ExecutionContext>(Tokens.BackgroundContext),
    timers: container.resolve<ITimerFactory>(Tokens.ITimerFactory),
    exclusivity: container.resolve<IExclusivityController>(Tokens.IExclusivityController),
    queue: container.resolve<IOperationQueue>(Tokens.IOperationQueue),
  };
}

/**
 * Cancel the work still held by services the container created: queued
 * operations and pending jobs of serial contexts.
 */
export function disposeContainer(container: ServiceContainer): void {
  let cancelled = 0;
  for (const instance of container.createdSingletons()) {
    if (instance instanceof OperationQueue) {
      cancelled += instance.operationCount;
      instance.cancelAllOperations();
    } else if (instance instanceof SerialContext) {
      cancelled += instance.pendingCount;
      instance.cancelAll();
    }
  }
  log.info('Container disposed', { cancelled });
}
