/**
 * @fileoverview Interface for execution contexts.
 *
 * A context decides where and when a job runs. Futures have no affinity of
 * their own; `schedule(on:)` and `receive(on:)` are the only places that pin
 * work to a context.
 *
 * @module interfaces/IExecutionContext
 */

/**
 * A job accepted by a context.
 */
export interface ScheduledJob {
  /** Drop the job if it has not started yet. */
  cancel(): void;
  readonly isCancelled: boolean;
}

/**
 * Where jobs run.
 *
 * @example
 * ```typescript
 * const main = new SerialContext('main');
 * fetchExpiry().receive(main).observe(updateView);
 * ```
 */
export interface ExecutionContext {
  /** Name used in log lines and by {@link currentContext} checks */
  readonly name: string;

  /** Queue a job. */
  schedule(job: () => void): ScheduledJob;
}
