/**
 * @fileoverview Operation running a caller-supplied block.
 *
 * @module operations/blockOperation
 */

import { Operation, OperationOptions } from './operation';

/**
 * Block run by a {@link BlockOperation}. It must call `finish` when its work
 * is done; `operation.isCancelled` tells it whether to stop early.
 */
export type OperationBlock = (finish: () => void, operation: BlockOperation) => void;

/**
 * @example
 * ```typescript
 * const refresh = new BlockOperation((finish) => {
 *   relayCache.refresh().observe(() => finish());
 * }, { name: 'refresh-relays' });
 * queue.addOperation(refresh);
 * ```
 */
export class BlockOperation extends Operation {
  constructor(private readonly block: OperationBlock, options: OperationOptions = {}) {
    super(options);
  }

  protected main(): void {
    this.block(() => this.finish(), this);
  }
}
