/**
 * @fileoverview Operation Queue - bounded-parallelism work queue.
 *
 * Holds operations from `addOperation` until they finish. Whenever an
 * operation becomes ready, or a running one finishes, the queue pumps:
 * ready operations are started in submission order while fewer than
 * `maxConcurrentOperationCount` are running. Starting is dispatched through
 * an {@link ExecutionContext}, so the queue decides what runs and the context
 * decides where.
 *
 * Cancelled operations that are ready are started regardless of the limit;
 * starting one only finishes it.
 *
 * @module operations/operationQueue
 */

import { EventEmitter } from 'events';
import { Logger } from '../core/logger';
import { OperationStateError } from '../core/errors';
import { MacrotaskContext } from '../context/executionContext';
import type { ExecutionContext } from '../interfaces/IExecutionContext';
import type { ILogger } from '../interfaces/ILogger';
import type { IOperationQueue } from '../interfaces/IOperationQueue';
import { Operation } from './operation';

/** Queue each operation was added to */
const owners = new WeakMap<Operation, OperationQueue>();

export interface OperationQueueOptions {
  name?: string;
  /** Defaults to 1 (a serial queue) */
  maxConcurrentOperationCount?: number;
  /** Where operations are started; defaults to a macrotask context */
  context?: ExecutionContext;
  logger?: ILogger;
}

/**
 * Events emitted by a queue
 */
export interface OperationQueueEvents {
  'operationStarted': (operation: Operation) => void;
  'operationFinished': (operation: Operation) => void;
  'idle': () => void;
}

export class OperationQueue extends EventEmitter implements IOperationQueue {
  readonly name: string;

  private maxConcurrent: number;
  private readonly context: ExecutionContext;
  private readonly log: ILogger;

  /** Added, not yet started, in submission order */
  private readonly pending: Operation[] = [];
  /** Dispatched to the context and not yet finished */
  private readonly running = new Set<Operation>();

  private pumping = false;
  private pumpRequested = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: OperationQueueOptions = {}) {
    super();
    this.name = options.name ?? 'default';
    this.maxConcurrent = validateConcurrency(options.maxConcurrentOperationCount ?? 1);
    this.context = options.context ?? new MacrotaskContext(this.name);
    this.log = options.logger ?? Logger.for('queue');
  }

  // ============================================================================
  // CONFIGURATION
  // ============================================================================

  get maxConcurrentOperationCount(): number {
    return this.maxConcurrent;
  }

  set maxConcurrentOperationCount(value: number) {
    this.maxConcurrent = validateConcurrency(value);
    this.pump();
  }

  get operationCount(): number {
    return this.pending.length + this.running.size;
  }

  // ============================================================================
  // QUEUE MANAGEMENT
  // ============================================================================

  /**
   * Add an operation. Finished operations, executing operations and
   * operations already in this queue are logged and ignored.
   *
   * @throws {OperationStateError} if the operation belongs to another queue
   */
  addOperation(operation: Operation): void {
    const owner = owners.get(operation);
    if (owner && owner !== this) {
      throw new OperationStateError(
        `Operation ${operation.name} already belongs to queue ${owner.name}`,
        operation.id,
      );
    }
    if (owner === this) {
      this.log.warn(`Ignoring duplicate add of ${operation.name}`, { queue: this.name });
      return;
    }
    if (operation.isFinished || operation.isExecuting) {
      this.log.warn(`Ignoring ${operation.status} operation ${operation.name}`, { queue: this.name });
      return;
    }

    owners.set(operation, this);
    this.pending.push(operation);
    operation.on('ready', this.requestPump);
    operation.on('cancelled', this.requestPump);
    operation.once('finished', () => this.onOperationFinished(operation));

    this.log.debug(`Operation added: ${operation.name}`, {
      queue: this.name,
      status: operation.status,
      dependencies: operation.dependencies.length,
    });

    this.pump();
  }

  addOperations(operations: readonly Operation[]): void {
    for (const operation of operations) {
      this.addOperation(operation);
    }
  }

  cancelAllOperations(): void {
    const operations = [...this.pending, ...this.running];
    if (operations.length > 0) {
      this.log.info(`Cancelling ${operations.length} operation(s)`, { queue: this.name });
    }
    for (const operation of operations) {
      operation.cancel();
    }
  }

  onIdle(): Promise<void> {
    if (this.operationCount === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // ============================================================================
  // PUMP
  // ============================================================================

  /** Runs when a held operation becomes ready or is cancelled */
  private readonly requestPump = (): void => {
    this.pump();
  };

  private onOperationFinished(operation: Operation): void {
    operation.off('ready', this.requestPump);
    operation.off('cancelled', this.requestPump);

    const index = this.pending.indexOf(operation);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }
    this.running.delete(operation);

    this.log.debug(`Operation finished: ${operation.name}`, {
      queue: this.name,
      cancelled: operation.isCancelled,
      remaining: this.operationCount,
    });
    this.emit('operationFinished', operation);

    this.pump();
    this.checkIdle();
  }

  /**
   * Start ready operations up to the concurrency limit. Re-entrant calls
   * (an operation finishing synchronously inside `start`) request another
   * pass instead of nesting.
   */
  private pump(): void {
    if (this.pumping) {
      this.pumpRequested = true;
      return;
    }

    this.pumping = true;
    try {
      do {
        this.pumpRequested = false;
        this.startReadyOperations();
      } while (this.pumpRequested);
    } finally {
      this.pumping = false;
    }
  }

  private startReadyOperations(): void {
    for (const operation of [...this.pending]) {
      if (!operation.isReady) continue;
      if (!operation.isCancelled && this.running.size >= this.maxConcurrent) continue;

      const index = this.pending.indexOf(operation);
      if (index < 0) continue;

      this.pending.splice(index, 1);
      this.running.add(operation);
      this.dispatch(operation);
    }
  }

  private dispatch(operation: Operation): void {
    this.context.schedule(() => {
      // A dependency added between dispatch and this job puts it back in line
      if (operation.status === 'created') {
        this.running.delete(operation);
        this.pending.unshift(operation);
        this.log.debug(`Operation no longer ready: ${operation.name}`, { queue: this.name });
        this.pump();
        return;
      }
      this.emit('operationStarted', operation);
      operation.start();
    });
  }

  private checkIdle(): void {
    if (this.operationCount > 0) {
      return;
    }
    this.emit('idle');
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`maxConcurrentOperationCount must be an integer >= 1, got ${value}`);
  }
  return value;
}
