/**
 * @fileoverview Future - single-resolution, push-only async value.
 *
 * A future is lazy: its setup function runs once, when the first observer
 * subscribes. It resolves at most once; every observer receives the same
 * completion exactly once, and late observers receive it synchronously.
 * There is no way to read the value without observing.
 *
 * Combinators return new futures that subscribe to their upstream when they
 * are themselves observed. Cancelling a derived future cancels whichever
 * upstream stage is outstanding, so one `cancel()` at the end of a chain
 * reaches the stage that is actually doing work.
 *
 * @example
 * ```typescript
 * const token = fetchAccount(accountNumber)
 *   .mapError((error) => new LoginError(error))
 *   .then((account) => saveAccount(account))
 *   .receive(mainContext)
 *   .observe((completion) => render(completion));
 *
 * // later, e.g. when the view goes away
 * token.cancel();
 * ```
 *
 * @module future/future
 */

import { FutureCell } from './cell';
import { Resolver } from './resolver';
import { CancellationBag, CancellationToken, CellCancellationToken } from './cancellation';
import { systemTimers, ITimerFactory } from './timers';
import type { ExecutionContext, ScheduledJob } from '../interfaces/IExecutionContext';
import { CANCELLED, Completion, Observer, Result, TimerKind } from './types';

/**
 * Setup function of a future; runs once, on first observation.
 */
export type FutureSetup<S, F> = (resolver: Resolver<S, F>) => void;

export class Future<S, F = never> {
  private readonly cell = new FutureCell<S, F>();
  private setup: FutureSetup<S, F> | undefined;

  constructor(setup: FutureSetup<S, F>) {
    this.setup = setup;
  }

  // ============================================================================
  // FACTORIES
  // ============================================================================

  static resolved<S, F = never>(value: S): Future<S, F> {
    return new Future<S, F>((resolver) => resolver.succeed(value));
  }

  static failed<F, S = never>(error: F): Future<S, F> {
    return new Future<S, F>((resolver) => resolver.fail(error));
  }

  static cancelled<S = never, F = never>(): Future<S, F> {
    return new Future<S, F>((resolver) => resolver.cancel());
  }

  static fromResult<S, F>(result: Result<S, F>): Future<S, F> {
    return new Future<S, F>((resolver) => resolver.resolveResult(result));
  }

  /**
   * Future whose body runs when observed and returns its result directly.
   * Combine with {@link schedule} to run the body on a given context.
   */
  static deferred<S, F>(body: () => Result<S, F>): Future<S, F> {
    return new Future<S, F>((resolver) => resolver.resolveResult(body()));
  }

  // ============================================================================
  // CONSUMPTION
  // ============================================================================

  /**
   * Subscribe to the completion, starting the computation if it has not
   * started yet.
   */
  observe(observer: Observer<S, F>): CancellationToken {
    this.cell.addObserver(observer);
    this.start();
    return new CellCancellationToken(this.cell);
  }

  /**
   * Observe through a native promise. The promise settles with the
   * completion and never rejects.
   */
  toPromise(): Promise<Completion<S, F>> {
    return new Promise((resolve) => {
      this.observe(resolve);
    });
  }

  private start(): void {
    const setup = this.setup;
    if (!setup) {
      return;
    }
    this.setup = undefined;
    setup(new Resolver(this.cell));
  }

  // ============================================================================
  // COMBINATORS
  // ============================================================================

  /**
   * Transform the success value.
   */
  map<N>(transform: (value: S) => N): Future<N, F> {
    return new Future<N, F>((resolver) => {
      link(this, resolver, (completion) => {
        if (completion.kind === 'cancelled') {
          resolver.resolve(CANCELLED);
        } else if (completion.result.ok) {
          resolver.succeed(transform(completion.result.value));
        } else {
          resolver.fail(completion.result.error);
        }
      });
    });
  }

  /**
   * Transform the failure value.
   */
  mapError<G>(transform: (error: F) => G): Future<S, G> {
    return new Future<S, G>((resolver) => {
      link(this, resolver, (completion) => {
        if (completion.kind === 'cancelled') {
          resolver.resolve(CANCELLED);
        } else if (completion.result.ok) {
          resolver.succeed(completion.result.value);
        } else {
          resolver.fail(transform(completion.result.error));
        }
      });
    });
  }

  /**
   * Map the success value to a result that may itself fail.
   */
  mapResult<N>(transform: (value: S) => Result<N, F>): Future<N, F> {
    return new Future<N, F>((resolver) => {
      link(this, resolver, (completion) => {
        if (completion.kind === 'cancelled') {
          resolver.resolve(CANCELLED);
        } else if (completion.result.ok) {
          resolver.resolveResult(transform(completion.result.value));
        } else {
          resolver.fail(completion.result.error);
        }
      });
    });
  }

  /**
   * Continue with the future returned by `next` after a success. Failures and
   * cancellation skip `next`.
   */
  then<N, G = F>(next: (value: S) => Future<N, G>): Future<N, F | G> {
    return new Future<N, F | G>((resolver) => {
      link(this, resolver, (completion) => {
        if (completion.kind === 'cancelled') {
          resolver.resolve(CANCELLED);
        } else if (!completion.result.ok) {
          resolver.fail(completion.result.error);
        } else if (!resolver.isResolved) {
          // Replaces the upstream cancel handler with the inner stage's
          link(next(completion.result.value), resolver, (inner) => resolver.resolve(inner));
        }
      });
    });
  }

  /** Alias of {@link then}. */
  flatMap<N, G = F>(next: (value: S) => Future<N, G>): Future<N, F | G> {
    return this.then(next);
  }

  /**
   * Run a side effect on success and pass the completion through.
   */
  onSuccess(effect: (value: S) => void): Future<S, F> {
    return this.tap((completion) => {
      if (completion.kind === 'finished' && completion.result.ok) {
        effect(completion.result.value);
      }
    });
  }

  /**
   * Run a side effect on failure and pass the completion through.
   */
  onFailure(effect: (error: F) => void): Future<S, F> {
    return this.tap((completion) => {
      if (completion.kind === 'finished' && !completion.result.ok) {
        effect(completion.result.error);
      }
    });
  }

  /**
   * Run a side effect on cancellation and pass the completion through.
   */
  onCancel(effect: () => void): Future<S, F> {
    return this.tap((completion) => {
      if (completion.kind === 'cancelled') {
        effect();
      }
    });
  }

  private tap(effect: Observer<S, F>): Future<S, F> {
    return new Future<S, F>((resolver) => {
      link(
        this,
        resolver,
        (completion) => {
          if (!resolver.isResolved) {
            effect(completion);
          }
          resolver.resolve(completion);
        },
        () => effect(CANCELLED),
      );
    });
  }

  /**
   * Start the upstream only when `context` runs the start job. Cancelling
   * before then drops the job, and the upstream never starts.
   */
  schedule(context: ExecutionContext): Future<S, F> {
    return new Future<S, F>((resolver) => {
      let job: ScheduledJob | undefined;
      let cancelRequested = false;

      // Replaced by the upstream subscription once the job runs
      resolver.setCancelHandler(() => {
        cancelRequested = true;
        job?.cancel();
      });

      job = context.schedule(() => {
        if (resolver.isResolved) return;
        link(this, resolver, (completion) => resolver.resolve(completion));
      });

      if (cancelRequested) {
        job.cancel();
      }
    });
  }

  /**
   * Deliver the completion on `context`. Cancellation while the delivery is
   * queued drops it; downstream then sees `cancelled`.
   */
  receive(context: ExecutionContext): Future<S, F> {
    return new Future<S, F>((resolver) => {
      link(this, resolver, (completion) => {
        if (resolver.isResolved) return;
        const job = context.schedule(() => resolver.resolve(completion));
        resolver.setCancelHandler(() => job.cancel());
      });
    });
  }

  /**
   * Wait `durationMs` after a success before passing it on. The wait is
   * cancellable until the timer fires; failures and cancellation pass
   * without waiting.
   */
  delay(durationMs: number, timerKind: TimerKind = 'deadline', timers: ITimerFactory = systemTimers): Future<S, F> {
    return this.then((value) => new Future<S, F>((resolver) => {
      const handle = timers.schedule(timerKind, durationMs, () => resolver.succeed(value));
      resolver.setCancelHandler(() => handle.cancel());
    }));
  }

  /**
   * Pass-through whose cancellation token is added to `bag`, so that
   * `bag.cancelAll()` cancels this stage and everything upstream.
   */
  storeCancellationToken(bag: CancellationBag): Future<S, F> {
    return new Future<S, F>((resolver) => {
      bag.add({ cancel: () => resolver.cancel() });
      link(this, resolver, (completion) => resolver.resolve(completion));
    });
  }
}

/**
 * Observe `source` on behalf of `resolver`: cancelling the resolver's future
 * runs `onCancel`, then cancels the subscription. The handler is installed
 * before subscribing, so a nested `link` made while subscribing (a
 * synchronous upstream inside `then`) keeps its own handler.
 */
export function link<S, F, N, G>(
  source: Future<S, F>,
  resolver: Resolver<N, G>,
  onCompletion: Observer<S, F>,
  onCancel?: () => void,
): void {
  let token: CancellationToken | undefined;
  let cancelRequested = false;

  resolver.setCancelHandler(() => {
    cancelRequested = true;
    onCancel?.();
    token?.cancel();
  });

  token = source.observe(onCompletion);

  if (cancelRequested) {
    token.cancel();
  }
}
