/**
 * @fileoverview Unit tests for scheduler errors
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { JobFailureError, SchedulerError, isSchedulerError, jobNotFound } from '../../../core/errors';

suite('SchedulerError', () => {
  test('carries kind, message and job id', () => {
    const error = new SchedulerError('timeout', 'too slow', 'job-1');

    assert.ok(error instanceof Error);
    assert.strictEqual(error.name, 'SchedulerError');
    assert.strictEqual(error.kind, 'timeout');
    assert.strictEqual(error.message, 'too slow');
    assert.strictEqual(error.jobId, 'job-1');
  });

  test('JobFailureError is a job-failure SchedulerError', () => {
    const error = new JobFailureError('job-2', 'ValueError: boom', 'ValueError: boom\n    at body');

    assert.ok(error instanceof SchedulerError);
    assert.strictEqual(error.name, 'JobFailureError');
    assert.strictEqual(error.kind, 'job-failure');
    assert.strictEqual(error.message, 'ValueError: boom');
    assert.strictEqual(error.traceback, 'ValueError: boom\n    at body');
  });

  test('isSchedulerError narrows by kind', () => {
    const error = jobNotFound('job-3');

    assert.strictEqual(isSchedulerError(error), true);
    assert.strictEqual(isSchedulerError(error, 'not-found'), true);
    assert.strictEqual(isSchedulerError(error, 'timeout'), false);
    assert.strictEqual(isSchedulerError(new Error('plain')), false);
    assert.strictEqual(error.message, 'Job not found: job-3');
  });
});
