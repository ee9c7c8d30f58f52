/**
 * @fileoverview Core module exports.
 *
 * Logging, configuration, errors, validation and the DI container.
 *
 * @module core
 */

export type { LogLevel, LogComponent, LogSink } from './logger';
export { Logger, ComponentLogger, LOG_COMPONENTS, stderrSink } from './logger';
export type { RuntimeConfig } from './config';
export {
  StaticConfigProvider,
  EnvConfigProvider,
  ENV_PREFIX,
  envVarName,
  defaultRuntimeConfig,
  loadRuntimeConfig,
} from './config';
export {
  InvalidRetryStrategyError,
  ConfigValidationError,
  OperationStateError,
  describeError,
} from './errors';
export type { ValidationResult } from './validation/validator';
export { validateRetryStrategy, isRetryStrategy } from './validation/validator';
export type { ServiceFactory } from './container';
export { ServiceContainer } from './container';
export * as Tokens from './tokens';
