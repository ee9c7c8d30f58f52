/**
 * @fileoverview Cancellation tokens and token bags.
 *
 * @module future/cancellation
 */

import type { FutureCell } from './cell';

/**
 * Consumer-side handle returned by `Future.observe`.
 *
 * `cancel()` is best-effort: once the future resolved it does nothing;
 * otherwise the future completes `cancelled` and its cancel handler runs
 * exactly once.
 */
export interface CancellationToken {
  cancel(): void;
}

/**
 * Token bound to a future's state cell.
 */
export class CellCancellationToken<S, F> implements CancellationToken {
  constructor(private readonly cell: FutureCell<S, F>) {}

  cancel(): void {
    this.cell.cancel();
  }
}

/**
 * Collects tokens so a group of subscriptions can be cancelled together.
 *
 * @example
 * ```typescript
 * const bag = new CancellationBag();
 * refreshRelays().storeCancellationToken(bag).observe(handle);
 * // on shutdown
 * bag.cancelAll();
 * ```
 */
export class CancellationBag {
  private tokens: CancellationToken[] = [];

  get size(): number {
    return this.tokens.length;
  }

  add(token: CancellationToken): void {
    this.tokens.push(token);
  }

  /**
   * Cancel every stored token in insertion order and empty the bag.
   */
  cancelAll(): void {
    const tokens = this.tokens;
    this.tokens = [];
    for (const token of tokens) {
      token.cancel();
    }
  }

  /**
   * Forget the stored tokens without cancelling them.
   */
  clear(): void {
    this.tokens = [];
  }
}
