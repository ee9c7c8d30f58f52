/**
 * @fileoverview Unit tests for ExclusivityController.
 *
 * @module test/unit/operations/exclusivityController.unit.test
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { ExclusivityController } from '../../../operations/exclusivityController';
import { OperationQueue } from '../../../operations/operationQueue';
import { BlockOperation } from '../../../operations/blockOperation';
import { ImmediateContext, MacrotaskContext } from '../../../context/executionContext';
import type { ILogger } from '../../../interfaces/ILogger';

function createStubLogger(): ILogger & { warn: sinon.SinonStub } {
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

/**
 * Operation that appends `start:<name>` and `finish:<name>` to a shared trace.
 */
function tracedOperation(name: string, trace: string[]) {
  let finishOperation: (() => void) | undefined;
  const operation = new BlockOperation((finish) => {
    trace.push(`start:${name}`);
    finishOperation = finish;
  }, { name, logger: createStubLogger() });

  return {
    operation,
    finish(): void {
      assert.ok(finishOperation, `${name} was never started`);
      trace.push(`finish:${name}`);
      finishOperation();
    },
  };
}

function createQueue(maxConcurrentOperationCount: number): OperationQueue {
  return new OperationQueue({
    maxConcurrentOperationCount,
    context: new ImmediateContext(),
    logger: createStubLogger(),
  });
}

suite('ExclusivityController', () => {
  test('serializes a category in submission order while other categories run', () => {
    const trace: string[] = [];
    const queue = createQueue(4);
    const exclusivity = new ExclusivityController(createStubLogger());
    const a = tracedOperation('A', trace);
    const b = tracedOperation('B', trace);
    const c = tracedOperation('C', trace);
    const d = tracedOperation('D', trace);

    for (const entry of [a, b, c]) {
      exclusivity.addOperation(entry.operation, ['account']);
      queue.addOperation(entry.operation);
    }
    exclusivity.addOperation(d.operation, ['other']);
    queue.addOperation(d.operation);

    assert.deepStrictEqual(trace, ['start:A', 'start:D']);

    a.finish();
    b.finish();
    c.finish();
    d.finish();

    assert.deepStrictEqual(trace, [
      'start:A',
      'start:D',
      'finish:A',
      'start:B',
      'finish:B',
      'start:C',
      'finish:C',
      'finish:D',
    ]);
    assert.strictEqual(exclusivity.categoryCount, 0);
  });

  test('never overlaps operations of one category on an asynchronous queue', async () => {
    const queue = new OperationQueue({
      maxConcurrentOperationCount: 4,
      context: new MacrotaskContext(),
      logger: createStubLogger(),
    });
    const exclusivity = new ExclusivityController(createStubLogger());
    const order: string[] = [];
    let active = 0;
    let maxActive = 0;

    for (const name of ['first', 'second', 'third']) {
      const operation = new BlockOperation((finish) => {
        active++;
        maxActive = Math.max(maxActive, active);
        order.push(name);
        setTimeout(() => {
          active--;
          finish();
        }, 2);
      }, { name, logger: createStubLogger() });
      exclusivity.addOperation(operation, ['account']);
      queue.addOperation(operation);
    }

    await queue.onIdle();

    assert.deepStrictEqual(order, ['first', 'second', 'third']);
    assert.strictEqual(maxActive, 1);
  });

  test('an operation in several categories waits for the tail of each', () => {
    const exclusivity = new ExclusivityController(createStubLogger());
    const trace: string[] = [];
    const x = tracedOperation('X', trace);
    const y = tracedOperation('Y', trace);
    const z = tracedOperation('Z', trace);
    const both = tracedOperation('both', trace);
    const unrelated = tracedOperation('unrelated', trace);

    exclusivity.addOperation(x.operation, ['a']);
    exclusivity.addOperation(y.operation, ['b']);
    exclusivity.addOperation(both.operation, ['a', 'b']);
    exclusivity.addOperation(z.operation, ['b']);
    exclusivity.addOperation(unrelated.operation, ['c']);

    assert.deepStrictEqual(both.operation.dependencies, [x.operation, y.operation]);
    assert.deepStrictEqual(z.operation.dependencies, [both.operation]);
    assert.deepStrictEqual(unrelated.operation.dependencies, []);
    assert.strictEqual(unrelated.operation.isReady, true);
    assert.strictEqual(exclusivity.categoryCount, 3);
  });

  test('finishing an operation removes it from its categories', () => {
    const exclusivity = new ExclusivityController(createStubLogger());
    const trace: string[] = [];
    const x = tracedOperation('X', trace);
    const y = tracedOperation('Y', trace);
    exclusivity.addOperation(x.operation, ['a', 'b']);
    exclusivity.addOperation(y.operation, ['a']);

    x.operation.start();
    x.finish();

    assert.deepStrictEqual(exclusivity.operationsIn('a'), [y.operation]);
    assert.deepStrictEqual(exclusivity.operationsIn('b'), []);
    assert.strictEqual(exclusivity.categoryCount, 1);
    assert.strictEqual(y.operation.isReady, true);
  });

  test('repeated categories and repeated adds create no extra dependencies', () => {
    const exclusivity = new ExclusivityController(createStubLogger());
    const trace: string[] = [];
    const x = tracedOperation('X', trace);

    exclusivity.addOperation(x.operation, ['a', 'a']);
    exclusivity.addOperation(x.operation, ['a']);

    assert.deepStrictEqual(exclusivity.operationsIn('a'), [x.operation]);
    assert.deepStrictEqual(x.operation.dependencies, []);
  });

  test('addOperations chains the operations in order', () => {
    const exclusivity = new ExclusivityController(createStubLogger());
    const trace: string[] = [];
    const x = tracedOperation('X', trace);
    const y = tracedOperation('Y', trace);
    const z = tracedOperation('Z', trace);

    exclusivity.addOperations([x.operation, y.operation, z.operation], ['a']);

    assert.deepStrictEqual(exclusivity.operationsIn('a'), [x.operation, y.operation, z.operation]);
    assert.deepStrictEqual(y.operation.dependencies, [x.operation]);
    assert.deepStrictEqual(z.operation.dependencies, [y.operation]);
  });

  test('removeOperation is idempotent', () => {
    const exclusivity = new ExclusivityController(createStubLogger());
    const trace: string[] = [];
    const x = tracedOperation('X', trace);
    exclusivity.addOperation(x.operation, ['a']);

    exclusivity.removeOperation(x.operation, ['a']);
    exclusivity.removeOperation(x.operation, ['a', 'missing']);

    assert.strictEqual(exclusivity.categoryCount, 0);
  });

  test('ignores an operation that already started', () => {
    const logger = createStubLogger();
    const exclusivity = new ExclusivityController(logger);
    const trace: string[] = [];
    const x = tracedOperation('X', trace);
    x.operation.start();

    exclusivity.addOperation(x.operation, ['a']);

    assert.strictEqual(exclusivity.categoryCount, 0);
    assert.ok(logger.warn.calledWith('Ignoring executing operation X'));
  });
});
