/**
 * @fileoverview Interface for the exclusivity controller.
 *
 * @module interfaces/IExclusivityController
 */

import type { Operation } from '../operations/operation';

/**
 * Serializes operations that share a category.
 *
 * Two operations with a category in common run one after the other, in the
 * order they were added; operations with no category in common do not wait
 * for each other.
 */
export interface IExclusivityController {
  /**
   * Make `operation` depend on the latest operation of every category, and
   * make it the latest one. Must be called before the operation is queued.
   */
  addOperation(operation: Operation, categories: readonly string[]): void;

  /** {@link addOperation} for each operation, in order. */
  addOperations(operations: readonly Operation[], categories: readonly string[]): void;

  /** Forget `operation` in the given categories. Idempotent. */
  removeOperation(operation: Operation, categories: readonly string[]): void;

  /** Categories with at least one unfinished operation */
  readonly categoryCount: number;

  /** Unfinished operations of `category`, oldest first */
  operationsIn(category: string): readonly Operation[];
}
