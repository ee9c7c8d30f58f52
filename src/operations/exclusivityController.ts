/**
 * @fileoverview Exclusivity Controller - per-category FIFO between operations.
 *
 * Each category maps to its unfinished operations in submission order; the
 * last one is the category's tail. Adding an operation makes it depend on the
 * tail of every category it names, which yields strict FIFO inside a category
 * while operations in disjoint categories stay independent.
 *
 * Every add registers a completion block that removes the operation again,
 * so a category's entry disappears with its last operation.
 *
 * @module operations/exclusivityController
 */

import { Logger } from '../core/logger';
import type { ILogger } from '../interfaces/ILogger';
import type { IExclusivityController } from '../interfaces/IExclusivityController';
import type { Operation } from './operation';

export class ExclusivityController implements IExclusivityController {
  private readonly categories = new Map<string, Operation[]>();

  constructor(private readonly log: ILogger = Logger.for('exclusivity')) {}

  get categoryCount(): number {
    return this.categories.size;
  }

  operationsIn(category: string): readonly Operation[] {
    return [...(this.categories.get(category) ?? [])];
  }

  addOperation(operation: Operation, categories: readonly string[]): void {
    if (operation.isExecuting || operation.isFinished) {
      this.log.warn(`Ignoring ${operation.status} operation ${operation.name}`, { categories });
      return;
    }

    const keys = [...new Set(categories)];
    const added: string[] = [];

    for (const key of keys) {
      const operations = this.categories.get(key) ?? [];
      if (operations.includes(operation)) {
        continue;
      }

      const tail = operations[operations.length - 1];
      if (tail) {
        operation.addDependency(tail);
      }

      operations.push(operation);
      this.categories.set(key, operations);
      added.push(key);
    }

    if (added.length === 0) {
      return;
    }

    this.log.debug(`Operation added: ${operation.name}`, {
      categories: added,
      dependencies: operation.dependencies.length,
    });

    operation.addCompletionBlock(() => this.removeOperation(operation, added));
  }

  addOperations(operations: readonly Operation[], categories: readonly string[]): void {
    for (const operation of operations) {
      this.addOperation(operation, categories);
    }
  }

  removeOperation(operation: Operation, categories: readonly string[]): void {
    for (const key of categories) {
      const operations = this.categories.get(key);
      if (!operations) continue;

      const index = operations.indexOf(operation);
      if (index < 0) continue;

      operations.splice(index, 1);
      if (operations.length === 0) {
        this.categories.delete(key);
      }
    }
  }
}
