/**
 * @fileoverview Queue runner - bridges futures and operations.
 *
 * A {@link FutureOperation} observes its future when the queue starts it and
 * finishes only once the future completes. {@link runOnQueue} wraps that in a
 * new future, optionally entering the operation into exclusivity categories
 * before it is queued.
 *
 * @module operations/futureOperation
 */

import { Future } from '../future/future';
import type { CancellationToken } from '../future/cancellation';
import { CANCELLED, Completion } from '../future/types';
import type { IExclusivityController } from '../interfaces/IExclusivityController';
import type { IOperationQueue } from '../interfaces/IOperationQueue';
import { Operation, OperationOptions } from './operation';

/**
 * Operation whose work is observing a future.
 *
 * {@link completion} holds the future's completion once finished; it stays
 * `cancelled` when the operation is cancelled before it starts.
 */
export class FutureOperation<S, F> extends Operation {
  private token: CancellationToken | undefined;
  private outcome: Completion<S, F> = CANCELLED;

  constructor(private readonly future: Future<S, F>, options: OperationOptions = {}) {
    super(options);
  }

  get completion(): Completion<S, F> {
    return this.outcome;
  }

  protected main(): void {
    const token = this.future.observe((completion) => {
      this.outcome = completion;
      this.token = undefined;
      this.finish();
    });

    if (!this.isFinished) {
      this.token = token;
    }
  }

  protected operationDidCancel(): void {
    const token = this.token;
    this.token = undefined;
    token?.cancel();
  }
}

/**
 * Options of {@link runOnQueue}. Categories need the controller that
 * serializes them.
 */
export type RunOptions =
  | { name?: string; categories?: undefined; exclusivity?: IExclusivityController }
  | { name?: string; categories: readonly string[]; exclusivity: IExclusivityController };

/**
 * Run `future` as an operation of `queue`.
 *
 * The returned future starts nothing until observed; observing it enqueues
 * the operation. It completes with the wrapped future's completion once the
 * operation finishes, and cancelling it cancels the operation.
 *
 * @example
 * ```typescript
 * runOnQueue(updateAccountData(accountNumber), queue, {
 *   categories: ['account'],
 *   exclusivity,
 * }).observe(handleUpdate);
 * ```
 */
export function runOnQueue<S, F>(
  future: Future<S, F>,
  queue: IOperationQueue,
  options: RunOptions = {},
): Future<S, F> {
  return new Future<S, F>((resolver) => {
    const operation = new FutureOperation(future, { name: options.name });
    operation.addCompletionBlock(() => resolver.resolve(operation.completion));
    resolver.setCancelHandler(() => operation.cancel());

    const { categories, exclusivity } = options;
    if (categories && exclusivity) {
      exclusivity.addOperation(operation, categories);
    }
    queue.addOperation(operation);
  });
}
