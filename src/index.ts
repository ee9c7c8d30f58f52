/**
 * @fileoverview Package entry point.
 *
 * @example
 * ```typescript
 * import { createContainer, resolveServices, retry, runOnQueue } from 'exclusivity-futures';
 *
 * const { queue, exclusivity, config } = resolveServices(createContainer());
 * runOnQueue(retry(config.retry.defaultStrategy, fetchRelays), queue, {
 *   categories: ['relay-cache'],
 *   exclusivity,
 * }).observe(handleRelays);
 * ```
 *
 * @module exclusivity-futures
 */

export * from './future';
export * from './operations';
export * from './interfaces';
export * from './core';
export {
  ImmediateContext,
  MicrotaskContext,
  MacrotaskContext,
  SerialContext,
  currentContext,
} from './context/executionContext';
export type { ContainerOptions, CoreServices } from './composition';
export { createContainer, resolveServices, disposeContainer } from './composition';
