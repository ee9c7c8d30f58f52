/**
 * @fileoverview Operation - schedulable unit of work.
 *
 * Lifecycle: `created → ready → executing → finished`. An operation becomes
 * ready once every dependency has finished; a queue then starts it. Subclasses
 * implement {@link Operation.main} and call {@link Operation.finish} when the
 * work is done, synchronously or later.
 *
 * Key Principles:
 * - All status changes go through {@link Operation.transition}
 * - Invalid transitions are rejected and logged, never thrown
 * - `finish()` and `cancel()` are idempotent
 * - A cancelled operation still waits for its dependencies, then finishes
 *   without running `main()`
 *
 * @module operations/operation
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/logger';
import { OperationStateError } from '../core/errors';
import type { ILogger } from '../interfaces/ILogger';
import { OperationStatus, OperationTransitionEvent, isValidTransition } from './types';

export interface OperationOptions {
  /** Display name used in log lines; defaults to a prefix of the id */
  name?: string;
  logger?: ILogger;
}

export abstract class Operation extends EventEmitter {
  readonly id: string = uuidv4();
  readonly name: string;

  protected readonly log: ILogger;

  private currentStatus: OperationStatus = 'created';
  private cancelled = false;
  private readonly dependencyListeners = new Map<Operation, () => void>();
  private completionBlocks: Array<() => void> = [];

  constructor(options: OperationOptions = {}) {
    super();
    this.name = options.name ?? `operation-${this.id.slice(0, 8)}`;
    this.log = options.logger ?? Logger.for('operation');
    this.evaluateReadiness();
  }

  // ============================================================================
  // STATE
  // ============================================================================

  get status(): OperationStatus {
    return this.currentStatus;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isReady(): boolean {
    return this.currentStatus === 'ready';
  }

  get isExecuting(): boolean {
    return this.currentStatus === 'executing';
  }

  get isFinished(): boolean {
    return this.currentStatus === 'finished';
  }

  /**
   * Apply a status change.
   *
   * @returns true if the transition was applied, false if it was invalid
   */
  protected transition(to: OperationStatus): boolean {
    const from = this.currentStatus;
    if (!isValidTransition(from, to)) {
      this.log.warn(`Invalid transition rejected: ${this.name} ${from} -> ${to}`, { operationId: this.id });
      return false;
    }

    this.currentStatus = to;
    this.log.debug(`Operation transition: ${this.name} ${from} -> ${to}`, { operationId: this.id });

    const event: OperationTransitionEvent = {
      operationId: this.id,
      from,
      to,
      timestamp: Date.now(),
    };
    this.emit('transition', event);
    return true;
  }

  // ============================================================================
  // DEPENDENCIES
  // ============================================================================

  get dependencies(): Operation[] {
    return Array.from(this.dependencyListeners.keys());
  }

  /**
   * Make this operation wait for `operation` to finish.
   *
   * @throws {OperationStateError} if this operation already started, or on a
   * dependency on itself
   */
  addDependency(operation: Operation): void {
    if (operation === this) {
      throw new OperationStateError(`Operation ${this.name} cannot depend on itself`, this.id);
    }
    if (this.isExecuting || this.isFinished) {
      throw new OperationStateError(
        `Cannot add a dependency to ${this.name}: operation is ${this.currentStatus}`,
        this.id,
      );
    }
    if (this.dependencyListeners.has(operation)) {
      return;
    }

    const listener = () => this.evaluateReadiness();
    this.dependencyListeners.set(operation, listener);

    if (!operation.isFinished) {
      operation.once('finished', listener);
      if (this.isReady) {
        this.transition('created');
      }
    }
  }

  /**
   * @throws {OperationStateError} if this operation already started
   */
  removeDependency(operation: Operation): void {
    if (this.isExecuting || this.isFinished) {
      throw new OperationStateError(
        `Cannot remove a dependency from ${this.name}: operation is ${this.currentStatus}`,
        this.id,
      );
    }
    const listener = this.dependencyListeners.get(operation);
    if (!listener) {
      return;
    }
    this.dependencyListeners.delete(operation);
    operation.off('finished', listener);
    this.evaluateReadiness();
  }

  private evaluateReadiness(): void {
    if (this.currentStatus !== 'created') {
      return;
    }
    for (const dependency of this.dependencyListeners.keys()) {
      if (!dependency.isFinished) {
        return;
      }
    }
    if (this.transition('ready')) {
      this.emit('ready', this.id);
    }
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Register a block to run once this operation finishes. Blocks run in
   * registration order; a block added after finishing runs immediately.
   */
  addCompletionBlock(block: () => void): void {
    if (this.isFinished) {
      block();
      return;
    }
    this.completionBlocks.push(block);
  }

  /**
   * Begin executing. Called by the queue once the operation is ready.
   * Anything other than a ready operation is logged and ignored.
   */
  start(): void {
    if (!this.isReady) {
      this.log.warn(`Cannot start ${this.name}: operation is ${this.currentStatus}`, { operationId: this.id });
      return;
    }

    if (this.cancelled) {
      this.log.debug(`Skipping cancelled operation: ${this.name}`);
      this.finish();
      return;
    }

    this.transition('executing');
    try {
      this.main();
    } catch (error) {
      this.log.error(`Operation ${this.name} threw from main()`, error);
      this.finish();
    }
  }

  /**
   * The work of the operation. Must eventually call {@link finish}.
   */
  protected abstract main(): void;

  /**
   * Mark the operation cancelled. An executing operation is told through
   * {@link operationDidCancel}; one that has not started finishes as soon
   * as the queue starts it.
   */
  cancel(): void {
    if (this.cancelled || this.isFinished) {
      return;
    }
    this.cancelled = true;
    this.log.debug(`Operation cancelled: ${this.name}`, { status: this.currentStatus });
    this.emit('cancelled', this.id);
    this.operationDidCancel();
  }

  /**
   * Hook run once when the operation is cancelled before finishing.
   */
  protected operationDidCancel(): void {
    // Subclasses stop their work here
  }

  /**
   * Move to `finished`, run completion blocks, then notify dependents.
   * Later calls are ignored. A block that throws is logged; the remaining
   * blocks still run and dependents are still notified.
   */
  finish(): void {
    if (this.isFinished) {
      return;
    }
    if (!this.transition('finished')) {
      return;
    }

    const blocks = this.completionBlocks;
    this.completionBlocks = [];
    for (const block of blocks) {
      try {
        block();
      } catch (error) {
        this.log.error(`Completion block of ${this.name} threw`, error);
      }
    }

    this.emit('finished', this.id);
  }
}
