/**
 * @fileoverview Future Types - completions, results and retry strategies.
 *
 * A future ends in exactly one {@link Completion}: either `finished` with a
 * {@link Result}, or `cancelled`. Cancellation is a terminal state of its own,
 * never an error value.
 *
 * @module future/types
 */

// ============================================================================
// RESULT
// ============================================================================

export interface Success<S> {
  readonly ok: true;
  readonly value: S;
}

export interface Failure<F> {
  readonly ok: false;
  readonly error: F;
}

/**
 * Outcome of a finished computation. The failure type is chosen by the caller.
 */
export type Result<S, F> = Success<S> | Failure<F>;

export function success<S>(value: S): Success<S> {
  return { ok: true, value };
}

export function failure<F>(error: F): Failure<F> {
  return { ok: false, error };
}

// ============================================================================
// COMPLETION
// ============================================================================

export interface FinishedCompletion<S, F> {
  readonly kind: 'finished';
  readonly result: Result<S, F>;
}

export interface CancelledCompletion {
  readonly kind: 'cancelled';
}

/**
 * Terminal state of a future. Immutable once stored.
 */
export type Completion<S, F> = FinishedCompletion<S, F> | CancelledCompletion;

/** The single cancelled completion shared by every future. */
export const CANCELLED: CancelledCompletion = Object.freeze({ kind: 'cancelled' });

export function finished<S, F>(result: Result<S, F>): FinishedCompletion<S, F> {
  return { kind: 'finished', result };
}

export function succeeded<S>(value: S): FinishedCompletion<S, never> {
  return finished(success(value));
}

export function failed<F>(error: F): FinishedCompletion<never, F> {
  return finished(failure(error));
}

export function isCancelled<S, F>(completion: Completion<S, F>): completion is CancelledCompletion {
  return completion.kind === 'cancelled';
}

/**
 * Callback receiving a future's completion.
 */
export type Observer<S, F> = (completion: Completion<S, F>) => void;

// ============================================================================
// TIMERS & RETRY
// ============================================================================

/**
 * How a delay measures time.
 * - `deadline`: monotonic elapsed time; stops while the machine sleeps
 * - `wallClock`: `Date.now()`; fires promptly after a sleep or clock jump
 */
export type TimerKind = 'deadline' | 'wallClock';

/**
 * Spacing between retry attempts.
 * - `immediate`: always zero
 * - `constant`: always `delayMs`
 * - `sequence`: `delaysMs` in order, then retrying stops
 */
export type WaitPolicy =
  | { kind: 'immediate' }
  | { kind: 'constant'; delayMs: number }
  | { kind: 'sequence'; delaysMs: number[] };

/**
 * Attempt budget and spacing for {@link retry}.
 */
export interface RetryStrategy {
  /** Total attempts including the first one; at least 1 */
  maxAttempts: number;
  waitPolicy: WaitPolicy;
  timerKind: TimerKind;
}

/**
 * Iterate the waits of a policy. `immediate` and `constant` never end.
 */
export function* waitDelays(policy: WaitPolicy): Generator<number, void, undefined> {
  switch (policy.kind) {
    case 'immediate':
      while (true) {
        yield 0;
      }
    case 'constant':
      while (true) {
        yield policy.delayMs;
      }
    case 'sequence':
      yield* policy.delaysMs;
      return;
  }
}

/**
 * Narrow a completion to its result, or undefined when cancelled.
 */
export function resultOf<S, F>(completion: Completion<S, F>): Result<S, F> | undefined {
  return completion.kind === 'finished' ? completion.result : undefined;
}
