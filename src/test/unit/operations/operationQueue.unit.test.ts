/**
 * @fileoverview Unit tests for OperationQueue.
 *
 * @module test/unit/operations/operationQueue.unit.test
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { OperationQueue } from '../../../operations/operationQueue';
import { BlockOperation } from '../../../operations/blockOperation';
import { Operation } from '../../../operations/operation';
import { ImmediateContext } from '../../../context/executionContext';
import { OperationStateError } from '../../../core/errors';
import type { ILogger } from '../../../interfaces/ILogger';
import { ManualContext } from '../mocks/manualContext';

function createStubLogger(): ILogger & { info: sinon.SinonStub; warn: sinon.SinonStub } {
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

function manualOperation(name: string) {
  const state = { started: 0, finish: (): void => assert.fail(`${name} was never started`) };
  const operation = new BlockOperation((finish) => {
    state.started++;
    state.finish = finish;
  }, { name, logger: createStubLogger() });
  return { operation, state };
}

function createQueue(maxConcurrentOperationCount: number, logger: ILogger = createStubLogger(), name = 'test') {
  return new OperationQueue({
    name,
    maxConcurrentOperationCount,
    context: new ImmediateContext(),
    logger,
  });
}

function recordStarts(queue: OperationQueue): string[] {
  const started: string[] = [];
  queue.on('operationStarted', (operation: Operation) => started.push(operation.name));
  return started;
}

suite('OperationQueue', () => {
  suite('concurrency', () => {
    test('starts at most maxConcurrentOperationCount operations', () => {
      const queue = createQueue(2);
      const a = manualOperation('a');
      const b = manualOperation('b');
      const c = manualOperation('c');

      queue.addOperations([a.operation, b.operation, c.operation]);

      assert.strictEqual(a.state.started, 1);
      assert.strictEqual(b.state.started, 1);
      assert.strictEqual(c.state.started, 0);
      assert.strictEqual(queue.operationCount, 3);

      a.state.finish();

      assert.strictEqual(c.state.started, 1);
      assert.strictEqual(queue.operationCount, 2);
    });

    test('starts ready operations in submission order', () => {
      const queue = createQueue(1);
      const started = recordStarts(queue);
      const a = manualOperation('a');
      const b = manualOperation('b');
      const c = manualOperation('c');

      queue.addOperations([a.operation, b.operation, c.operation]);
      a.state.finish();
      b.state.finish();

      assert.deepStrictEqual(started, ['a', 'b', 'c']);
    });

    test('an operation waiting on a dependency does not hold back later ready ones', () => {
      const queue = createQueue(1);
      const started = recordStarts(queue);
      const outside = manualOperation('outside');
      const b = manualOperation('b');
      const c = manualOperation('c');
      b.operation.addDependency(outside.operation);

      queue.addOperations([b.operation, c.operation]);
      assert.deepStrictEqual(started, ['c']);

      outside.operation.start();
      outside.state.finish();
      assert.deepStrictEqual(started, ['c']);

      c.state.finish();
      assert.deepStrictEqual(started, ['c', 'b']);
    });

    test('a cancelled ready operation is started past the limit and finishes without running', () => {
      const queue = createQueue(1);
      const a = manualOperation('a');
      const b = manualOperation('b');
      queue.addOperations([a.operation, b.operation]);

      b.operation.cancel();

      assert.strictEqual(b.state.started, 0);
      assert.strictEqual(b.operation.isFinished, true);
      assert.strictEqual(a.operation.isExecuting, true);
      assert.strictEqual(queue.operationCount, 1);
    });

    test('an operation given a dependency after dispatch waits for it and frees its slot', () => {
      const context = new ManualContext();
      const queue = new OperationQueue({ maxConcurrentOperationCount: 1, context, logger: createStubLogger() });
      const started = recordStarts(queue);
      const a = manualOperation('a');
      const b = manualOperation('b');
      const dep = manualOperation('dep');
      queue.addOperations([a.operation, b.operation]);

      a.operation.addDependency(dep.operation);
      context.runAll();
      assert.strictEqual(a.state.started, 0);
      assert.strictEqual(a.operation.status, 'created');
      assert.strictEqual(queue.operationCount, 2);

      context.runAll();
      assert.deepStrictEqual(started, ['b']);

      dep.operation.start();
      dep.state.finish();
      b.state.finish();
      context.runAll();

      assert.deepStrictEqual(started, ['b', 'a']);
      assert.strictEqual(a.state.started, 1);
    });

    test('raising the limit starts held operations', () => {
      const queue = createQueue(1);
      const a = manualOperation('a');
      const b = manualOperation('b');
      queue.addOperations([a.operation, b.operation]);
      assert.strictEqual(b.state.started, 0);

      queue.maxConcurrentOperationCount = 2;

      assert.strictEqual(b.state.started, 1);
    });

    test('rejects a limit that is not a positive integer', () => {
      assert.throws(() => createQueue(0), RangeError);

      const queue = createQueue(1);
      assert.throws(
        () => {
          queue.maxConcurrentOperationCount = 1.5;
        },
        { name: 'RangeError', message: 'maxConcurrentOperationCount must be an integer >= 1, got 1.5' },
      );
      assert.strictEqual(queue.maxConcurrentOperationCount, 1);
    });
  });

  suite('membership', () => {
    test('ignores finished operations', () => {
      const logger = createStubLogger();
      const queue = createQueue(1, logger);
      const done = manualOperation('done');
      done.operation.start();
      done.state.finish();

      queue.addOperation(done.operation);

      assert.strictEqual(queue.operationCount, 0);
      assert.ok(logger.warn.calledWith('Ignoring finished operation done'));
    });

    test('ignores a second add of the same operation', () => {
      const logger = createStubLogger();
      const queue = createQueue(1, logger);
      const a = manualOperation('a');

      queue.addOperation(a.operation);
      queue.addOperation(a.operation);

      assert.strictEqual(a.state.started, 1);
      assert.strictEqual(queue.operationCount, 1);
      assert.ok(logger.warn.calledWith('Ignoring duplicate add of a'));
    });

    test('an operation cannot join a second queue', () => {
      const first = createQueue(1, createStubLogger(), 'first');
      const second = createQueue(1, createStubLogger(), 'second');
      const a = manualOperation('a');
      first.addOperation(a.operation);

      assert.throws(
        () => second.addOperation(a.operation),
        (error: unknown) =>
          error instanceof OperationStateError &&
          error.message === 'Operation a already belongs to queue first' &&
          error.operationId === a.operation.id,
      );
    });

    test('emits operationFinished and idle', () => {
      const queue = createQueue(2);
      const events: string[] = [];
      queue.on('operationFinished', (operation: Operation) => events.push(`finished:${operation.name}`));
      queue.on('idle', () => events.push('idle'));
      const a = manualOperation('a');
      const b = manualOperation('b');
      queue.addOperations([a.operation, b.operation]);

      a.state.finish();
      b.state.finish();

      assert.deepStrictEqual(events, ['finished:a', 'finished:b', 'idle']);
    });
  });

  suite('cancelAllOperations', () => {
    test('cancels running and held operations', () => {
      const logger = createStubLogger();
      const queue = createQueue(1, logger);
      const a = manualOperation('a');
      const b = manualOperation('b');
      const c = manualOperation('c');
      queue.addOperations([a.operation, b.operation, c.operation]);

      queue.cancelAllOperations();

      assert.ok(logger.info.calledWith('Cancelling 3 operation(s)'));
      assert.strictEqual(a.operation.isCancelled, true);
      assert.strictEqual(a.operation.isExecuting, true);
      assert.strictEqual(b.state.started, 0);
      assert.strictEqual(c.state.started, 0);
      assert.strictEqual(b.operation.isFinished, true);
      assert.strictEqual(c.operation.isFinished, true);
      assert.strictEqual(queue.operationCount, 1);

      a.state.finish();
      assert.strictEqual(queue.operationCount, 0);
    });
  });

  suite('onIdle', () => {
    test('resolves at once on an empty queue', async () => {
      await createQueue(1).onIdle();
    });

    test('resolves once every operation has finished', async () => {
      const queue = createQueue(1);
      const a = manualOperation('a');
      queue.addOperation(a.operation);
      let idle = false;

      const waiting = queue.onIdle().then(() => {
        idle = true;
      });
      await Promise.resolve();
      assert.strictEqual(idle, false);

      a.state.finish();
      await waiting;
      assert.strictEqual(idle, true);
    });
  });

  suite('default context', () => {
    test('starts operations on a later turn', async () => {
      const queue = new OperationQueue({ logger: createStubLogger() });
      const a = manualOperation('a');

      queue.addOperation(a.operation);
      assert.strictEqual(a.state.started, 0);
      assert.strictEqual(queue.name, 'default');
      assert.strictEqual(queue.maxConcurrentOperationCount, 1);

      await new Promise((resolve) => setImmediate(resolve));
      assert.strictEqual(a.state.started, 1);
    });
  });
});
