/**
 * @fileoverview Execution contexts.
 *
 * - {@link ImmediateContext}: runs the job synchronously, inside `schedule`
 * - {@link MicrotaskContext}: `queueMicrotask`
 * - {@link MacrotaskContext}: `setImmediate`
 * - {@link SerialContext}: FIFO, one job per macrotask turn, never overlapping
 *
 * While a job runs, {@link currentContext} returns the context running it.
 *
 * @module context/executionContext
 */

import type { ExecutionContext, ScheduledJob } from '../interfaces/IExecutionContext';
import { Logger } from '../core/logger';

const log = Logger.for('context');

let current: ExecutionContext | undefined;

/**
 * The context whose job is running right now, if any.
 */
export function currentContext(): ExecutionContext | undefined {
  return current;
}

/**
 * Run `job` with `context` as the current context, restoring the previous
 * one afterwards (contexts may nest through {@link ImmediateContext}).
 */
function runIn(context: ExecutionContext, job: () => void): void {
  const previous = current;
  current = context;
  try {
    job();
  } finally {
    current = previous;
  }
}

/**
 * Job handle with a cancelled flag checked right before the job runs.
 */
class Job implements ScheduledJob {
  private cancelled = false;
  private done = false;

  constructor(private readonly body: () => void) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    if (!this.done) {
      this.cancelled = true;
    }
  }

  run(context: ExecutionContext): void {
    if (this.cancelled || this.done) {
      return;
    }
    this.done = true;
    runIn(context, this.body);
  }
}

/**
 * Runs jobs synchronously on the caller's stack.
 */
export class ImmediateContext implements ExecutionContext {
  constructor(readonly name: string = 'immediate') {}

  schedule(job: () => void): ScheduledJob {
    const scheduled = new Job(job);
    scheduled.run(this);
    return scheduled;
  }
}

/**
 * Runs jobs on the microtask queue.
 */
export class MicrotaskContext implements ExecutionContext {
  constructor(readonly name: string = 'microtask') {}

  schedule(job: () => void): ScheduledJob {
    const scheduled = new Job(job);
    queueMicrotask(() => scheduled.run(this));
    return scheduled;
  }
}

/**
 * Runs each job in its own macrotask (`setImmediate`). Jobs from different
 * `schedule` calls may interleave with other I/O.
 */
export class MacrotaskContext implements ExecutionContext {
  constructor(readonly name: string = 'macrotask') {}

  schedule(job: () => void): ScheduledJob {
    const scheduled = new Job(job);
    setImmediate(() => scheduled.run(this));
    return scheduled;
  }
}

/**
 * FIFO context: jobs run one at a time in submission order, one job per
 * macrotask turn. Models a dedicated serial queue such as a "main" context.
 */
export class SerialContext implements ExecutionContext {
  private readonly jobs: Job[] = [];
  private drainScheduled = false;
  private running = false;

  constructor(readonly name: string) {}

  /** Jobs accepted but not yet run (cancelled ones included until skipped). */
  get pendingCount(): number {
    return this.jobs.length;
  }

  /** True while one of this context's jobs is on the stack. */
  get isRunningJob(): boolean {
    return this.running;
  }

  schedule(job: () => void): ScheduledJob {
    const scheduled = new Job(job);
    this.jobs.push(scheduled);
    this.scheduleDrain();
    return scheduled;
  }

  /**
   * Cancel every job that has not run yet.
   */
  cancelAll(): void {
    const jobs = this.jobs.splice(0);
    for (const job of jobs) {
      job.cancel();
    }
    if (jobs.length > 0) {
      log.debug(`Cancelled ${jobs.length} pending job(s) on ${this.name}`);
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drainOne());
  }

  private drainOne(): void {
    this.drainScheduled = false;

    // Skip cancelled jobs without spending a turn on them
    let next = this.jobs.shift();
    while (next && next.isCancelled) {
      next = this.jobs.shift();
    }

    if (next) {
      this.running = true;
      try {
        next.run(this);
      } finally {
        this.running = false;
        if (this.jobs.length > 0) {
          this.scheduleDrain();
        }
      }
    }
  }
}
