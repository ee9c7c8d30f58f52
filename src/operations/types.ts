/**
 * @fileoverview Operation Types
 *
 * Lifecycle states of an {@link Operation} and the transitions between them.
 * Cancellation is a flag, not a state: a cancelled operation still walks
 * `ready → finished` so that dependents observe it finishing.
 *
 * @module operations/types
 */

/**
 * Valid operation status values.
 */
export type OperationStatus =
  | 'created'     // Waiting for dependencies
  | 'ready'       // Dependencies finished, may be started
  | 'executing'   // main() running
  | 'finished';   // Terminal

/**
 * Valid state transitions.
 *
 * `ready → created` happens when an unfinished dependency is added to a
 * ready operation that has not started yet.
 */
export const VALID_TRANSITIONS: Record<OperationStatus, readonly OperationStatus[]> = {
  'created':   ['ready'],
  'ready':     ['created', 'executing', 'finished'],
  'executing': ['finished'],
  'finished':  [],  // Terminal
};

/**
 * Check if a transition is valid
 */
export function isValidTransition(from: OperationStatus, to: OperationStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Emitted on every accepted transition.
 */
export interface OperationTransitionEvent {
  operationId: string;
  from: OperationStatus;
  to: OperationStatus;
  timestamp: number;
}

/**
 * Events emitted by an operation
 */
export interface OperationEvents {
  'transition': (event: OperationTransitionEvent) => void;
  'ready': (operationId: string) => void;
  'cancelled': (operationId: string) => void;
  'finished': (operationId: string) => void;
}
