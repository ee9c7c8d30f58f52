/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * Provides a sink-based logging system that allows debug logging to be
 * enabled/disabled per component through an {@link IConfigProvider}.
 *
 * Until {@link Logger.initialize} is called, component loggers fall back to
 * console-only logging.
 *
 * Components:
 * - future: Future construction, resolution and cancellation
 * - retry: Retry attempts and exhaustion
 * - timer: Delay timers (deadline and wall-clock)
 * - context: Execution context dispatch
 * - operation: Operation lifecycle transitions
 * - queue: Work queue pumping
 * - exclusivity: Category bookkeeping
 * - config: Configuration loading
 * - init: Composition root
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('queue');
 * log.info('Queue started');
 * log.debug('Operation ready', { id: op.id });
 * log.error('Operation failed', error);
 * ```
 *
 * @module core/logger
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Components that can have logging enabled
 */
export type LogComponent =
  | 'future'
  | 'retry'
  | 'timer'
  | 'context'
  | 'operation'
  | 'queue'
  | 'exclusivity'
  | 'config'
  | 'init';

/** All known components, in display order. */
export const LOG_COMPONENTS: readonly LogComponent[] = [
  'future', 'retry', 'timer', 'context', 'operation', 'queue', 'exclusivity', 'config', 'init',
];

/** Configuration section holding the logging settings. */
export const LOGGING_CONFIG_SECTION = 'logging';

/**
 * Debug configuration per component
 */
type DebugConfig = Record<LogComponent, boolean>;

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(level: LogLevel, line: string): void;
}

/**
 * Default sink. Everything goes to stderr so stdout stays free for the host
 * application.
 */
export const stderrSink: LogSink = {
  write(_level: LogLevel, line: string): void {
    console.error(line);
  },
};

function defaultDebugConfig(): DebugConfig {
  return {
    future: false,
    retry: false,
    timer: false,
    context: false,
    operation: false,
    queue: false,
    exclusivity: false,
    config: false,
    init: false,
  };
}

/**
 * Centralized logger with per-component debug control.
 *
 * Writes to a {@link LogSink} (stderr by default). Debug logging can be
 * enabled/disabled per component via the `logging.debug.<component>` settings.
 */
export class Logger {
  private static instance: Logger | undefined;
  private debugConfig: DebugConfig = defaultDebugConfig();
  private minLevel: LogLevel = 'info';
  private configProvider: IConfigProvider | undefined;

  private constructor(private sink: LogSink) {}

  /**
   * Initialize the logger. Should be called once by the composition root.
   * Subsequent calls return the existing instance.
   */
  static initialize(sink: LogSink = stderrSink): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(sink);
    }
    return Logger.instance;
  }

  /**
   * Drop the singleton. Component loggers fall back to the console.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Get the singleton logger instance, if initialized.
   */
  static getInstance(): Logger | undefined {
    return Logger.instance;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   * @returns A ComponentLogger bound to the specified component
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Read debug flags through the given provider, now and on every
   * {@link reloadConfig}.
   */
  setConfigProvider(provider: IConfigProvider): void {
    this.configProvider = provider;
    this.reloadConfig();
  }

  /**
   * Replace the output sink.
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /**
   * Re-read debug configuration from the config provider.
   */
  reloadConfig(): void {
    const provider = this.configProvider;
    if (!provider) {
      return;
    }

    const next = defaultDebugConfig();
    for (const component of LOG_COMPONENTS) {
      next[component] = provider.getConfig<boolean>(LOGGING_CONFIG_SECTION, `debug.${component}`, false);
    }
    this.debugConfig = next;
    this.minLevel = provider.getConfig<LogLevel>(LOGGING_CONFIG_SECTION, 'level', 'info');
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.debugConfig[component] ?? false;
  }

  /** Minimum level written for non-debug entries. */
  getLevel(): LogLevel {
    return this.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  /**
   * Write a log entry.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    // Debug entries are gated per component, everything else by level
    if (level === 'debug') {
      if (!this.isDebugEnabled(component)) {
        return;
      }
    } else if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    this.sink.write(level, this.formatMessage(level, component, message) + formatData(data));
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Format additional data for logging.
 */
export function formatData(data?: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) {
    return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
  }
  try {
    return '\n  ' + JSON.stringify(data, null, 2).split('\n').join('\n  ');
  } catch {
    return `\n  [Unserializable data: ${typeof data}]`;
  }
}

/**
 * Component-scoped logger for convenience.
 *
 * Provides log methods pre-bound to a specific component.
 */
export class ComponentLogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.debug(this.component, message, data);
    }
    // Debug is opt-in; nothing reaches the console before initialization
  }

  info(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.info(this.component, message, data);
    } else {
      console.log(`[futures:${this.component}] ${message}`, data ?? '');
    }
  }

  warn(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.warn(this.component, message, data);
    } else {
      console.warn(`[futures:${this.component}] ${message}`, data ?? '');
    }
  }

  error(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.error(this.component, message, data);
    } else {
      console.error(`[futures:${this.component}] ${message}`, data ?? '');
    }
  }

  /**
   * Check if debug logging is enabled for this component.
   */
  isDebugEnabled(): boolean {
    return Logger.getInstance()?.isDebugEnabled(this.component) ?? false;
  }

  setLevel(level: LogLevel): void {
    Logger.getInstance()?.setLevel(level);
  }

  getLevel(): string {
    return Logger.getInstance()?.getLevel() ?? 'info';
  }
}
