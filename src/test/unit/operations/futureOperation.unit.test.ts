/**
 * @fileoverview Unit tests for FutureOperation and runOnQueue.
 *
 * @module test/unit/operations/futureOperation.unit.test
 */

import { suite, test, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { FutureOperation, runOnQueue } from '../../../operations/futureOperation';
import { OperationQueue } from '../../../operations/operationQueue';
import { ExclusivityController } from '../../../operations/exclusivityController';
import { ImmediateContext } from '../../../context/executionContext';
import { Future } from '../../../future/future';
import { CANCELLED, Completion, failed, succeeded } from '../../../future/types';
import { Logger, LogLevel } from '../../../core/logger';
import type { ILogger } from '../../../interfaces/ILogger';
import { controllable } from '../mocks/controllableFuture';

function createStubLogger(): ILogger {
  return {
    debug: sinon.stub(),
    info: sinon.stub(),
    warn: sinon.stub(),
    error: sinon.stub(),
    isDebugEnabled: sinon.stub().returns(false),
    setLevel: sinon.stub(),
    getLevel: sinon.stub().returns('info'),
  };
}

function createQueue(maxConcurrentOperationCount: number): OperationQueue {
  return new OperationQueue({
    maxConcurrentOperationCount,
    context: new ImmediateContext(),
    logger: createStubLogger(),
  });
}

suite('FutureOperation', () => {
  test('finishes when its future completes and keeps the completion', () => {
    const upstream = controllable<number>();
    const operation = new FutureOperation(upstream.future, { logger: createStubLogger() });

    operation.start();
    assert.strictEqual(operation.isExecuting, true);
    assert.strictEqual(upstream.calls.setup, 1);

    upstream.resolver().succeed(3);

    assert.strictEqual(operation.isFinished, true);
    assert.deepStrictEqual(operation.completion, succeeded(3));
  });

  test('cancelling while executing cancels the future', () => {
    const upstream = controllable<number>();
    const operation = new FutureOperation(upstream.future, { logger: createStubLogger() });
    operation.start();

    operation.cancel();

    assert.strictEqual(upstream.calls.cancel, 1);
    assert.strictEqual(operation.isFinished, true);
    assert.strictEqual(operation.completion, CANCELLED);
  });
});

suite('runOnQueue', () => {
  teardown(() => {
    Logger.reset();
  });

  test('completes with the completion of the wrapped future', () => {
    const queue = createQueue(1);
    const seen: Completion<number, string>[] = [];

    runOnQueue(Future.resolved<number, string>(4), queue).observe((c) => seen.push(c));
    runOnQueue(Future.failed<string, number>('bad'), queue).observe((c) => seen.push(c));

    assert.deepStrictEqual(seen, [succeeded(4), failed('bad')]);
    assert.strictEqual(queue.operationCount, 0);
  });

  test('enqueues nothing until observed', () => {
    const queue = createQueue(1);
    const upstream = controllable<number>();

    const future = runOnQueue(upstream.future, queue, { name: 'lazy' });

    assert.strictEqual(queue.operationCount, 0);
    future.observe(() => undefined);
    assert.strictEqual(queue.operationCount, 1);
    assert.strictEqual(upstream.calls.setup, 1);
  });

  test('cancelling before the operation starts never starts the future', () => {
    const queue = createQueue(1);
    const blocker = controllable<number>();
    const waiting = controllable<number>();
    const seen: Completion<number, string>[] = [];
    runOnQueue(blocker.future, queue).observe(() => undefined);

    const token = runOnQueue(waiting.future, queue).observe((c) => seen.push(c));
    token.cancel();

    assert.strictEqual(waiting.calls.setup, 0);
    assert.deepStrictEqual(seen, [CANCELLED]);
    assert.strictEqual(queue.operationCount, 1);
  });

  test('cancelling while running cancels the wrapped future and frees the slot', () => {
    const queue = createQueue(1);
    const running = controllable<number>();
    const next = controllable<number>();
    const seen: Completion<number, string>[] = [];

    const token = runOnQueue(running.future, queue).observe((c) => seen.push(c));
    runOnQueue(next.future, queue).observe(() => undefined);
    token.cancel();

    assert.strictEqual(running.calls.cancel, 1);
    assert.deepStrictEqual(seen, [CANCELLED]);
    assert.strictEqual(next.calls.setup, 1);
  });

  test('cancelAllOperations delivers cancelled to every caller', () => {
    const queue = createQueue(1);
    const first = controllable<number>();
    const second = controllable<number>();
    const seen: string[] = [];

    runOnQueue(first.future, queue).observe((c) => seen.push(`first:${c.kind}`));
    runOnQueue(second.future, queue).observe((c) => seen.push(`second:${c.kind}`));
    queue.cancelAllOperations();

    assert.deepStrictEqual(seen, ['second:cancelled', 'first:cancelled']);
    assert.strictEqual(first.calls.cancel, 1);
    assert.strictEqual(second.calls.setup, 0);
  });

  test('categories run futures one at a time', () => {
    const queue = createQueue(4);
    const exclusivity = new ExclusivityController(createStubLogger());
    const first = controllable<number>();
    const second = controllable<number>();
    const seen: Completion<number, string>[] = [];

    runOnQueue(first.future, queue, { categories: ['account'], exclusivity }).observe((c) => seen.push(c));
    runOnQueue(second.future, queue, { categories: ['account'], exclusivity }).observe((c) => seen.push(c));
    assert.strictEqual(first.calls.setup, 1);
    assert.strictEqual(second.calls.setup, 0);

    first.resolver().succeed(1);
    assert.strictEqual(second.calls.setup, 1);

    second.resolver().succeed(2);
    assert.deepStrictEqual(seen, [succeeded(1), succeeded(2)]);
    assert.strictEqual(exclusivity.categoryCount, 0);
  });

  test('an observer that throws does not hold up the rest of its category', () => {
    const errors: string[] = [];
    Logger.initialize({
      write: (level: LogLevel, line: string) => {
        if (level === 'error') errors.push(line);
      },
    });
    const queue = createQueue(4);
    const exclusivity = new ExclusivityController(createStubLogger());
    const first = controllable<number>();
    const second = controllable<number>();
    const seen: Completion<number, string>[] = [];

    runOnQueue(first.future, queue, { name: 'first', categories: ['account'], exclusivity })
      .map((): number => {
        throw new Error('observer failed');
      })
      .observe(() => undefined);
    runOnQueue(second.future, queue, { name: 'second', categories: ['account'], exclusivity })
      .observe((c) => seen.push(c));

    first.resolver().succeed(1);
    assert.strictEqual(second.calls.setup, 1);

    second.resolver().succeed(2);
    assert.deepStrictEqual(seen, [succeeded(2)]);
    assert.strictEqual(queue.operationCount, 0);
    assert.strictEqual(exclusivity.categoryCount, 0);
    assert.strictEqual(errors.length, 1);
    assert.ok(errors[0].includes('[ERROR] [operation] Completion block of first threw'));
  });
});
