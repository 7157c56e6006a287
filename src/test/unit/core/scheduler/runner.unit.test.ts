/**
 * @fileoverview Unit tests for JobRunner and failure capture
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { v4 as uuidv4, v7 as uuidv7 } from 'uuid';
import { Logger } from '../../../../core/logger';
import { currentJob } from '../../../../core/scheduler/jobContext';
import { ConcurrencyLimiter } from '../../../../core/scheduler/limiter';
import { JobRegistry } from '../../../../core/scheduler/registry';
import { JobRunner, captureFailure, isUuidString } from '../../../../core/scheduler/runner';
import { JobThunk } from '../../../../core/scheduler/types';
import type { ILogger } from '../../../../interfaces/ILogger';
import { ValueError, deferred, flush, quietLogs } from '../../helpers/testUtils';

function stubLogger(): ILogger & { [K in 'debug' | 'info' | 'warn' | 'error']: sinon.SinonStub } {
  return {
    debug: sinon.stub(),
    info: sinon.stub(),
    warn: sinon.stub(),
    error: sinon.stub(),
    isDebugEnabled: () => false,
  };
}

const never: JobThunk = () => new Promise(() => {});

suite('captureFailure', () => {
  test('summarizes an error as name and message', () => {
    const failure = captureFailure(new ValueError('boom'));
    assert.strictEqual(failure.summary, 'ValueError: boom');
    assert.ok(failure.traceback.includes('boom'));
  });

  test('uses the bare name when there is no message', () => {
    assert.strictEqual(captureFailure(new TypeError()).summary, 'TypeError');
  });

  test('describes thrown non-errors', () => {
    assert.deepStrictEqual(captureFailure('bad input'), {
      summary: 'Thrown string: bad input',
      traceback: 'Thrown string: bad input',
    });
  });
});

suite('isUuidString', () => {
  test('matches UUID strings only', () => {
    assert.strictEqual(isUuidString(uuidv7()), true);
    assert.strictEqual(isUuidString(uuidv4()), true);
    assert.strictEqual(isUuidString('not-a-uuid'), false);
    assert.strictEqual(isUuidString(42), false);
  });
});

suite('JobRunner', () => {
  let registry: JobRegistry;
  let controller: AbortController;

  setup(() => {
    quietLogs();
    registry = new JobRegistry();
    registry.insert({ id: 'job-1', status: 'pending', submittedAt: Date.now() });
    controller = new AbortController();
  });

  teardown(() => {
    Logger.reset();
  });

  test('completes a job and stores its result', async () => {
    const runner = new JobRunner(registry);
    await runner.run('job-1', async () => 'ok', controller.signal, undefined);

    const record = registry.snapshot('job-1');
    assert.strictEqual(record?.status, 'completed');
    assert.notStrictEqual(record?.startedAt, undefined);
    assert.notStrictEqual(record?.finishedAt, undefined);
    assert.strictEqual(registry.result('job-1'), 'ok');
  });

  test('attaches a returned UUID as correlation id', async () => {
    const correlationId = uuidv4();
    await new JobRunner(registry).run('job-1', async () => correlationId, controller.signal, undefined);

    assert.strictEqual(registry.snapshot('job-1')?.correlationId, correlationId);
  });

  test('uses a custom correlation id matcher', async () => {
    const runner = new JobRunner(registry, {
      isCorrelationId: (value: unknown): value is string => typeof value === 'string' && value.startsWith('req-'),
    });
    await runner.run('job-1', async () => 'req-17', controller.signal, undefined);

    assert.strictEqual(registry.snapshot('job-1')?.correlationId, 'req-17');
  });

  test('captures a failure without rejecting', async () => {
    const logger = stubLogger();
    const runner = new JobRunner(registry, { logger });

    await runner.run('job-1', async () => { throw new ValueError('boom'); }, controller.signal, undefined);

    const record = registry.snapshot('job-1');
    assert.strictEqual(record?.status, 'failed');
    assert.strictEqual(record?.error, 'ValueError: boom');
    assert.ok(record?.errorTraceback?.includes('boom'));
    assert.ok(logger.warn.calledOnceWith('Job job-1 failed: ValueError: boom'));
  });

  test('cancels a running job when the signal aborts', async () => {
    const done = new JobRunner(registry).run('job-1', never, controller.signal, undefined);
    await flush();
    assert.strictEqual(registry.status('job-1'), 'running');

    controller.abort();
    await done;

    assert.strictEqual(registry.status('job-1'), 'canceled');
    assert.notStrictEqual(registry.snapshot('job-1')?.finishedAt, undefined);
  });

  test('cancels a job still waiting for a permit', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const held = await limiter.acquire();

    const done = new JobRunner(registry).run('job-1', never, controller.signal, limiter);
    await flush();
    assert.strictEqual(registry.status('job-1'), 'pending');
    assert.strictEqual(limiter.waiting, 1);

    controller.abort();
    await done;

    assert.strictEqual(registry.status('job-1'), 'canceled');
    assert.strictEqual(registry.snapshot('job-1')?.startedAt, undefined);
    assert.strictEqual(limiter.waiting, 0);
    held.release();
    assert.strictEqual(limiter.active, 0);
  });

  test('releases its permit when the job ends', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await new JobRunner(registry).run('job-1', async () => 1, controller.signal, limiter);

    assert.strictEqual(limiter.active, 0);
  });

  test('releases its permit when the job fails', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await new JobRunner(registry).run('job-1', async () => { throw new ValueError('boom'); }, controller.signal, limiter);

    assert.strictEqual(registry.status('job-1'), 'failed');
    assert.strictEqual(limiter.active, 0);
  });

  test('holds the permit of a canceled job until its body settles', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred<string>();

    const done = new JobRunner(registry).run('job-1', () => gate.promise, controller.signal, limiter);
    await flush();
    assert.strictEqual(limiter.active, 1);

    controller.abort();
    await done;
    assert.strictEqual(registry.status('job-1'), 'canceled');
    assert.strictEqual(limiter.active, 1);

    gate.resolve('late');
    await flush();
    assert.strictEqual(limiter.active, 0);
    assert.strictEqual(registry.status('job-1'), 'canceled');
    assert.strictEqual(registry.result('job-1'), undefined);
  });

  test('releases the permit of a canceled body that rejects', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred<string>();

    const done = new JobRunner(registry).run('job-1', () => gate.promise, controller.signal, limiter);
    await flush();
    controller.abort();
    await done;

    gate.reject(new ValueError('late'));
    await flush();
    assert.strictEqual(limiter.active, 0);
    assert.strictEqual(registry.status('job-1'), 'canceled');
    assert.strictEqual(registry.snapshot('job-1')?.error, undefined);
  });

  test('exposes the job context to the body', async () => {
    await new JobRunner(registry).run(
      'job-1',
      async () => currentJob()?.jobId,
      controller.signal,
      undefined,
    );

    assert.strictEqual(registry.result('job-1'), 'job-1');
    assert.strictEqual(currentJob(), undefined);
  });
});
