/**
 * @fileoverview Configuration providers and the validated runtime configuration.
 *
 * {@link StaticConfigProvider} serves values from a nested object (tests,
 * embedding applications); {@link EnvConfigProvider} reads
 * `EXCLUSIVITY_FUTURES_<SECTION>_<KEY>` environment variables.
 * {@link loadRuntimeConfig} folds either into a {@link RuntimeConfig} and
 * validates it with Ajv.
 *
 * @module core/config
 */

import * as os from 'os';
import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { LogLevel } from './logger';
import type { RetryStrategy } from '../future/types';
import { ConfigValidationError } from './errors';
import { isRuntimeConfig, lastRuntimeConfigErrors } from './validation/validator';
import { Logger } from './logger';

const log = Logger.for('config');

/** Prefix of every environment variable read by {@link EnvConfigProvider}. */
export const ENV_PREFIX = 'EXCLUSIVITY_FUTURES';

/**
 * Settings consumed by the composition root.
 */
export interface RuntimeConfig {
  queue: {
    /** Operations the default work queue runs at once */
    maxConcurrentOperations: number;
  };
  timers: {
    /** Longest single sleep of a wall-clock timer before it re-reads the clock */
    wallClockCheckIntervalMs: number;
  };
  retry: {
    /** Strategy used by callers that do not bring their own */
    defaultStrategy: RetryStrategy;
  };
  logging: {
    level: LogLevel;
  };
}

/**
 * Number of CPUs minus one, never below one.
 */
export function cpuCountMinusOne(): number {
  const n = os.cpus().length || 2;
  return Math.max(1, n - 1);
}

/**
 * Defaults applied for every value a provider does not set.
 */
export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    queue: { maxConcurrentOperations: cpuCountMinusOne() },
    timers: { wallClockCheckIntervalMs: 1000 },
    retry: {
      defaultStrategy: {
        maxAttempts: 3,
        waitPolicy: { kind: 'constant', delayMs: 1000 },
        timerKind: 'deadline',
      },
    },
    logging: { level: 'info' },
  };
}

/**
 * True when `value` has the same runtime shape as `fallback`, so it can be
 * returned in its place.
 */
function matchesKind<T>(value: unknown, fallback: T): value is T {
  if (value === undefined || value === null) {
    return false;
  }
  if (Array.isArray(fallback)) {
    return Array.isArray(value);
  }
  return typeof value === typeof fallback;
}

/**
 * Serves configuration from a nested object.
 *
 * Keys containing dots are looked up first as a literal key, then as a path:
 * `getConfig('logging', 'debug.retry', false)` finds both
 * `{ logging: { 'debug.retry': true } }` and
 * `{ logging: { debug: { retry: true } } }`.
 */
export class StaticConfigProvider implements IConfigProvider {
  constructor(private readonly values: Record<string, unknown> = {}) {}

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const sectionValue = this.values[section];
    if (!isRecord(sectionValue)) {
      return defaultValue;
    }

    const value = key in sectionValue ? sectionValue[key] : lookupPath(sectionValue, key.split('.'));
    return matchesKind(value, defaultValue) ? value : defaultValue;
  }
}

/**
 * Reads configuration from environment variables.
 *
 * `getConfig('queue', 'maxConcurrentOperations', 4)` reads
 * `EXCLUSIVITY_FUTURES_QUEUE_MAXCONCURRENTOPERATIONS`; dots in keys become
 * underscores. Values are parsed as JSON when possible, so `true`, `8` and
 * `{"kind":"immediate"}` arrive typed.
 */
export class EnvConfigProvider implements IConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig<T>(section: string, key: string, defaultValue: T): T {
    const name = envVarName(section, key);
    const raw = this.env[name];
    if (raw === undefined || raw === '') {
      return defaultValue;
    }

    const value = parseEnvValue(raw);
    if (matchesKind(value, defaultValue)) {
      return value;
    }

    log.warn(`Ignoring ${name}: expected ${typeof defaultValue}, got ${typeof value}`);
    return defaultValue;
  }
}

/**
 * Environment variable name for a section/key pair.
 */
export function envVarName(section: string, key: string): string {
  return `${ENV_PREFIX}_${section}_${key}`.replace(/\./g, '_').toUpperCase();
}

function parseEnvValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookupPath(root: Record<string, unknown>, path: string[]): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Build and validate the runtime configuration.
 *
 * @throws {ConfigValidationError} when a provided value is out of range
 */
export function loadRuntimeConfig(provider: IConfigProvider): RuntimeConfig {
  const defaults = defaultRuntimeConfig();

  const candidate: RuntimeConfig = {
    queue: {
      maxConcurrentOperations: provider.getConfig(
        'queue', 'maxConcurrentOperations', defaults.queue.maxConcurrentOperations),
    },
    timers: {
      wallClockCheckIntervalMs: provider.getConfig(
        'timers', 'wallClockCheckIntervalMs', defaults.timers.wallClockCheckIntervalMs),
    },
    retry: {
      defaultStrategy: provider.getConfig('retry', 'defaultStrategy', defaults.retry.defaultStrategy),
    },
    logging: {
      level: provider.getConfig('logging', 'level', defaults.logging.level),
    },
  };

  if (!isRuntimeConfig(candidate)) {
    const details = lastRuntimeConfigErrors();
    throw new ConfigValidationError(`Invalid runtime configuration: ${details.join('; ')}`, details);
  }

  log.debug('Runtime configuration loaded', candidate);
  return candidate;
}
