/**
 * @fileoverview Unit tests for validation helpers and record serialization
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { isSchedulerError } from '../../../core/errors';
import { serializeJobRecord } from '../../../core/scheduler/types';
import {
  assertValid,
  formatErrors,
  strictAjv,
  validateSerializedRecord,
  validateSerializedRecordList,
} from '../../../core/validation';

suite('Validation', () => {
  suite('formatErrors', () => {
    test('reports missing details', () => {
      assert.strictEqual(formatErrors(null, 'options'), 'Invalid options (no details available)');
    });

    test('formats each error once', () => {
      const validate = strictAjv.compile({
        type: 'object',
        properties: { size: { type: 'integer', minimum: 1 } },
        required: ['size'],
        additionalProperties: false,
      });

      validate({});
      assert.strictEqual(formatErrors(validate.errors, 'options'), "Invalid options: Missing required field 'size' at /");

      validate({ size: 2, extra: true });
      assert.strictEqual(formatErrors(validate.errors, 'options'), "Invalid options: Unknown property 'extra' at /");

      validate({ size: 0 });
      assert.strictEqual(formatErrors(validate.errors, 'options'), 'Invalid options: Value at /size is too small (min 1)');
    });
  });

  test('assertValid throws invalid-argument', () => {
    const validate = strictAjv.compile<string>({ type: 'string' });

    assert.doesNotThrow(() => assertValid(validate, 'ok', 'label'));
    assert.throws(
      () => assertValid(validate, 5, 'label'),
      (error: unknown) => isSchedulerError(error, 'invalid-argument') && error.message === 'Invalid label: Expected string at /',
    );
  });

  suite('serialized records', () => {
    test('serializeJobRecord uses ISO timestamps and nulls', () => {
      assert.deepStrictEqual(
        serializeJobRecord({ id: 'job-1', status: 'completed', submittedAt: 0, startedAt: 1000, finishedAt: 2000 }),
        {
          id: 'job-1',
          status: 'completed',
          submittedAt: '1970-01-01T00:00:00.000Z',
          startedAt: '1970-01-01T00:00:01.000Z',
          finishedAt: '1970-01-01T00:00:02.000Z',
          error: null,
          errorTraceback: null,
          correlationId: null,
        },
      );
    });

    test('serialized records satisfy their schema', () => {
      const records = [
        serializeJobRecord({ id: 'job-1', status: 'pending', submittedAt: 0 }),
        serializeJobRecord({
          id: 'job-2',
          status: 'failed',
          submittedAt: 0,
          startedAt: 5,
          finishedAt: 9,
          error: 'Error: x',
          errorTraceback: 'Error: x\n    at body',
        }),
      ];

      assert.strictEqual(validateSerializedRecord(records[1]), true);
      assert.strictEqual(validateSerializedRecordList(records), true);
    });

    test('rejects malformed records', () => {
      const record = serializeJobRecord({ id: 'job-1', status: 'pending', submittedAt: 0 });

      assert.strictEqual(validateSerializedRecord({ ...record, status: 'queued' }), false);
      assert.strictEqual(validateSerializedRecord({ ...record, startedAt: 'yesterday' }), false);
      assert.strictEqual(validateSerializedRecordList([record, { id: 'job-2' }]), false);
    });
  });
});
