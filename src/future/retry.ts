/**
 * @fileoverview Retry operator.
 *
 * Re-runs a future producer until it succeeds, the attempt budget is spent,
 * or the retry future is cancelled. Exhaustion surfaces the last failure
 * exactly as the producer reported it.
 *
 * @module future/retry
 */

import { Future } from './future';
import type { Resolver } from './resolver';
import type { CancellationToken } from './cancellation';
import { systemTimers, ITimerFactory } from './timers';
import { CANCELLED, Completion, RetryStrategy, waitDelays } from './types';
import { validateRetryStrategy } from '../core/validation/validator';
import { InvalidRetryStrategyError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ILogger } from '../interfaces/ILogger';

export interface RetryOptions {
  /** Timer source for the waits between attempts */
  timers?: ITimerFactory;
  logger?: ILogger;
}

/**
 * State of one observed retry future.
 *
 * `generation` increases with every attempt and on cancellation; a callback
 * or token that belongs to an older generation is ignored.
 */
class RetryRun<S, F> {
  private attempts = 0;
  private generation = 0;
  private done = false;
  private outstanding: CancellationToken | undefined;
  private lastCompletion: Completion<S, F> = CANCELLED;
  private looping = false;
  private retryRequested = false;
  private readonly waits: Iterator<number, void>;

  constructor(
    private readonly strategy: RetryStrategy,
    private readonly producer: () => Future<S, F>,
    private readonly resolver: Resolver<S, F>,
    private readonly timers: ITimerFactory,
    private readonly log: ILogger,
  ) {
    this.waits = waitDelays(strategy.waitPolicy);
  }

  start(): void {
    this.runImmediately();
  }

  cancel(): void {
    if (this.done) return;
    this.log.debug('Retry cancelled', { attempts: this.attempts });
    this.generation++;
    const token = this.outstanding;
    this.outstanding = undefined;
    token?.cancel();
    this.complete(CANCELLED);
  }

  private attempt(future: Future<S, F>): void {
    const generation = ++this.generation;
    this.attempts++;
    this.log.debug(`Attempt ${this.attempts}/${this.strategy.maxAttempts}`);

    let settled = false;
    const token = future.observe((completion) => {
      settled = true;
      if (generation !== this.generation || this.done) return;
      this.outstanding = undefined;
      this.onAttemptCompleted(completion);
    });

    if (!settled && generation === this.generation && !this.done) {
      this.outstanding = token;
    }
  }

  /**
   * Start the next attempt without a wait. Attempts that fail synchronously
   * are run in a loop rather than nested, so the stack stays flat however
   * large `maxAttempts` is.
   */
  private runImmediately(): void {
    this.retryRequested = true;
    if (this.looping) return;
    this.looping = true;
    try {
      while (this.retryRequested && !this.done) {
        this.retryRequested = false;
        this.attempt(this.producer());
      }
    } finally {
      this.looping = false;
    }
  }

  private onAttemptCompleted(completion: Completion<S, F>): void {
    if (completion.kind === 'cancelled' || completion.result.ok) {
      this.complete(completion);
      return;
    }

    this.lastCompletion = completion;

    if (this.attempts >= this.strategy.maxAttempts) {
      this.log.debug('Retry attempts exhausted', { attempts: this.attempts });
      this.complete(completion);
      return;
    }

    const next = this.waits.next();
    if (next.done) {
      this.log.debug('Retry wait sequence exhausted', { attempts: this.attempts });
      this.complete(this.lastCompletion);
      return;
    }

    const waitMs = next.value;
    if (waitMs <= 0) {
      this.runImmediately();
      return;
    }

    this.log.debug(`Waiting ${waitMs}ms before next attempt`, { timerKind: this.strategy.timerKind });
    this.attempt(
      Future.resolved(undefined)
        .delay(waitMs, this.strategy.timerKind, this.timers)
        .then(() => this.producer()),
    );
  }

  private complete(completion: Completion<S, F>): void {
    if (this.done) return;
    this.done = true;
    this.outstanding = undefined;
    this.resolver.resolve(completion);
  }
}

/**
 * Run `producer` until it succeeds or `strategy` gives up.
 *
 * The first attempt runs as soon as the returned future is observed. Each
 * failure consumes one attempt; the next attempt runs after the policy's
 * next wait. Cancelling the returned future cancels the outstanding attempt
 * or wait and completes `cancelled`.
 *
 * @throws {InvalidRetryStrategyError} if `strategy` fails validation
 *
 * @example
 * ```typescript
 * const relays = retry(
 *   { maxAttempts: 3, waitPolicy: { kind: 'constant', delayMs: 2000 }, timerKind: 'deadline' },
 *   () => downloadRelays(etag),
 * );
 * ```
 */
export function retry<S, F>(
  strategy: RetryStrategy,
  producer: () => Future<S, F>,
  options: RetryOptions = {},
): Future<S, F> {
  const validation = validateRetryStrategy(strategy);
  if (!validation.valid) {
    throw new InvalidRetryStrategyError(
      `Invalid retry strategy: ${validation.details.join('; ')}`,
      validation.details,
    );
  }

  const timers = options.timers ?? systemTimers;
  const log = options.logger ?? Logger.for('retry');

  return new Future<S, F>((resolver) => {
    const run = new RetryRun(strategy, producer, resolver, timers, log);
    resolver.setCancelHandler(() => run.cancel());
    run.start();
  });
}
