/**
 * @fileoverview Unit tests for job target normalization
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import { isSchedulerError } from '../../../../core/errors';
import { Logger } from '../../../../core/logger';
import { isPromiseLike, normalizeTarget } from '../../../../core/scheduler/target';
import { quietLogs } from '../../helpers/testUtils';

function signal(): AbortSignal {
  return new AbortController().signal;
}

suite('normalizeTarget', () => {
  setup(() => {
    quietLogs();
  });

  teardown(() => {
    Logger.reset();
  });

  suite('functions', () => {
    test('calls async functions with their arguments', async () => {
      const thunk = normalizeTarget(async (a: number, b: number) => a + b, [2, 3]);
      assert.strictEqual(await thunk(signal()), 5);
    });

    test('does not call async functions until the thunk runs', async () => {
      let calls = 0;
      const thunk = normalizeTarget(async () => ++calls, []);
      assert.strictEqual(calls, 0);
      assert.strictEqual(await thunk(signal()), 1);
    });

    test('defers plain functions to a later macrotask', async () => {
      let called = false;
      const thunk = normalizeTarget((word: string) => {
        called = true;
        return word.toUpperCase();
      }, ['done']);

      const pending = thunk(signal());
      await Promise.resolve();
      assert.strictEqual(called, false);

      assert.strictEqual(await pending, 'DONE');
      assert.strictEqual(called, true);
    });

    test('skips plain functions canceled before they start', async () => {
      let called = false;
      const controller = new AbortController();
      const thunk = normalizeTarget(() => {
        called = true;
      }, []);

      const pending = thunk(controller.signal);
      controller.abort(new Error('stopped'));

      await assert.rejects(pending, /stopped/);
      assert.strictEqual(called, false);
    });

    test('rejects with the exception a plain function throws', async () => {
      const thunk = normalizeTarget(() => {
        throw new RangeError('out of range');
      }, []);

      await assert.rejects(thunk(signal()), RangeError);
    });
  });

  suite('promises', () => {
    test('resolves with the promise value', async () => {
      const thunk = normalizeTarget(Promise.resolve('value'), []);
      assert.strictEqual(await thunk(signal()), 'value');
    });

    test('holds an early rejection for the runner', async () => {
      const thunk = normalizeTarget(Promise.reject(new Error('early')), []);
      await assert.rejects(thunk(signal()), /early/);
    });

    test('accepts thenables', async () => {
      const thenable = {
        then(resolve: (value: number) => void) {
          resolve(7);
        },
      };
      const thunk = normalizeTarget(thenable, []);
      assert.strictEqual(await thunk(signal()), 7);
    });

    test('rejects arguments with a promise target', () => {
      assert.throws(
        () => normalizeTarget(Promise.resolve(1), ['extra']),
        (error: unknown) =>
          isSchedulerError(error, 'invalid-argument') &&
          error.message === 'Arguments are not supported when the job target is a promise (got 1)',
      );
    });
  });

  test('rejects targets that are neither functions nor promises', () => {
    assert.throws(
      () => normalizeTarget(42, []),
      (error: unknown) =>
        isSchedulerError(error, 'invalid-argument') &&
        error.message === 'Job target must be a function or a promise, got number',
    );
    assert.throws(() => normalizeTarget(null, []), /got null$/);
  });

  test('isPromiseLike recognizes only objects with a then method', () => {
    assert.strictEqual(isPromiseLike(Promise.resolve()), true);
    assert.strictEqual(isPromiseLike({ then: () => undefined }), true);
    assert.strictEqual(isPromiseLike({ then: 1 }), false);
    assert.strictEqual(isPromiseLike(null), false);
    assert.strictEqual(isPromiseLike('then'), false);
  });
});
