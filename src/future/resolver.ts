/**
 * @fileoverview Resolver - the producer-side capability of a future.
 *
 * @module future/resolver
 */

import type { FutureCell } from './cell';
import { Completion, Result, failed, finished, succeeded } from './types';

/**
 * Handed to a future's setup function. The first call to any of the
 * resolving methods wins; later calls are ignored.
 *
 * @example
 * ```typescript
 * const wait = new Future<void, never>((resolver) => {
 *   const handle = setTimeout(() => resolver.succeed(undefined), 100);
 *   resolver.setCancelHandler(() => clearTimeout(handle));
 * });
 * ```
 */
export class Resolver<S, F> {
  constructor(private readonly cell: FutureCell<S, F>) {}

  get isResolved(): boolean {
    return this.cell.isResolved;
  }

  get isCancelled(): boolean {
    return this.cell.isCancelled;
  }

  /**
   * @returns whether this completion was stored
   */
  resolve(completion: Completion<S, F>): boolean {
    return this.cell.resolve(completion);
  }

  resolveResult(result: Result<S, F>): boolean {
    return this.cell.resolve(finished(result));
  }

  succeed(value: S): boolean {
    return this.cell.resolve(succeeded(value));
  }

  fail(error: F): boolean {
    return this.cell.resolve(failed(error));
  }

  /**
   * Resolve as cancelled from the producer side. The cancel handler runs, as
   * it would for a consumer's cancellation.
   */
  cancel(): boolean {
    return this.cell.cancel();
  }

  /**
   * Replace the handler run when a consumer cancels before resolution.
   */
  setCancelHandler(handler: () => void): void {
    this.cell.setCancelHandler(handler);
  }
}
