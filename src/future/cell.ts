/**
 * @fileoverview Future state cell.
 *
 * The cell is the identity of a future: its pending/resolved state, the
 * observers waiting for it and the handler run on cancellation. Every
 * {@link Future}, {@link Resolver} and cancellation token created for one
 * computation shares a single cell.
 *
 * A transition detaches the observer list and writes the completion before
 * any callback runs, so callbacks may re-enter the cell (resolve, observe,
 * cancel) and only ever see the settled state.
 *
 * @module future/cell
 */

import { CANCELLED, Completion, Observer } from './types';

export class FutureCell<S, F> {
  private completion: Completion<S, F> | undefined;
  private observers: Observer<S, F>[] = [];
  private cancelHandler: (() => void) | undefined;

  get isResolved(): boolean {
    return this.completion !== undefined;
  }

  get isCancelled(): boolean {
    return this.completion?.kind === 'cancelled';
  }

  /**
   * Store the completion if none is stored yet and notify observers in
   * registration order.
   *
   * @returns whether this call won
   */
  resolve(completion: Completion<S, F>): boolean {
    if (this.completion !== undefined) {
      return false;
    }

    this.completion = completion;
    const observers = this.observers;
    this.observers = [];
    this.cancelHandler = undefined;

    notifyAll(observers, completion);
    return true;
  }

  /**
   * Register an observer. After resolution it runs synchronously with the
   * stored completion.
   */
  addObserver(observer: Observer<S, F>): void {
    if (this.completion !== undefined) {
      observer(this.completion);
      return;
    }
    this.observers.push(observer);
  }

  /**
   * Replace the handler invoked when cancellation is requested. Ignored once
   * resolved.
   */
  setCancelHandler(handler: () => void): void {
    if (this.completion === undefined) {
      this.cancelHandler = handler;
    }
  }

  /**
   * Resolve as cancelled, then run the cancel handler once.
   *
   * @returns false when the cell was already resolved
   */
  cancel(): boolean {
    if (this.completion !== undefined) {
      return false;
    }

    const handler = this.cancelHandler;
    try {
      this.resolve(CANCELLED);
    } finally {
      handler?.();
    }
    return true;
  }
}

/**
 * Run every observer even if one throws; the first error is rethrown after
 * the last observer ran.
 */
function notifyAll<S, F>(observers: Observer<S, F>[], completion: Completion<S, F>): void {
  let firstError: { error: unknown } | undefined;

  for (const observer of observers) {
    try {
      observer(completion);
    } catch (error) {
      if (!firstError) {
        firstError = { error };
      }
    }
  }

  if (firstError) {
    throw firstError.error;
  }
}
