/**
 * @fileoverview Interface for the operation work queue.
 *
 * @module interfaces/IOperationQueue
 */

import type { Operation } from '../operations/operation';

/**
 * Runs ready operations with bounded parallelism.
 */
export interface IOperationQueue {
  readonly name: string;

  /** Operations started at once; at least 1 */
  maxConcurrentOperationCount: number;

  /** Operations added and not yet finished */
  readonly operationCount: number;

  addOperation(operation: Operation): void;

  addOperations(operations: readonly Operation[]): void;

  /** Cancel every operation the queue still holds */
  cancelAllOperations(): void;

  /** Resolves once the queue holds no operations */
  onIdle(): Promise<void>;
}
