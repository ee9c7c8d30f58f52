/**
 * @fileoverview Future module exports.
 *
 * @module future
 */

export type {
  Success,
  Failure,
  Result,
  FinishedCompletion,
  CancelledCompletion,
  Completion,
  Observer,
  TimerKind,
  WaitPolicy,
  RetryStrategy,
} from './types';
export {
  success,
  failure,
  CANCELLED,
  finished,
  succeeded,
  failed,
  isCancelled,
  resultOf,
  waitDelays,
} from './types';
export type { FutureSetup } from './future';
export { Future, link } from './future';
export { Resolver } from './resolver';
export type { CancellationToken } from './cancellation';
export { CancellationBag } from './cancellation';
export type { ITimerFactory, TimerHandle } from './timers';
export { SystemTimerFactory, systemTimers, DEFAULT_WALL_CLOCK_CHECK_INTERVAL_MS } from './timers';
export type { RetryOptions } from './retry';
export { retry } from './retry';
