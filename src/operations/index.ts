/**
 * @fileoverview Operations module exports.
 *
 * Operation lifecycle, the work queue, the exclusivity controller and the
 * queue runner that lifts futures into operations.
 *
 * @module operations
 */

export type { OperationStatus, OperationTransitionEvent, OperationEvents } from './types';
export { VALID_TRANSITIONS, isValidTransition } from './types';
export type { OperationOptions } from './operation';
export { Operation } from './operation';
export type { OperationBlock } from './blockOperation';
export { BlockOperation } from './blockOperation';
export type { OperationQueueOptions, OperationQueueEvents } from './operationQueue';
export { OperationQueue } from './operationQueue';
export { ExclusivityController } from './exclusivityController';
export type { RunOptions } from './futureOperation';
export { FutureOperation, runOnQueue } from './futureOperation';
