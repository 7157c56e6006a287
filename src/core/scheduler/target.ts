/**
 * @fileoverview Target normalization.
 *
 * `addJob` accepts three shapes of work: async functions, plain functions and
 * already-created promises. Each is turned into a {@link JobThunk} once, at
 * submission, so the runner only ever awaits `thunk(signal)`.
 *
 * - Async functions are called with their bound arguments when the job starts.
 * - Plain functions are called on their own macrotask, after the submitting
 *   code and already-queued work have had a turn, and are skipped entirely if
 *   the job was canceled before then.
 * - Promises take no arguments. Their rejection is observed immediately so an
 *   early failure is held for the runner rather than reported as unhandled.
 *
 * @module core/scheduler/target
 */

import { types } from 'util';
import { SchedulerError } from '../errors';
import { Logger } from '../logger';
import type { JobThunk } from './types';

const log = Logger.for('scheduler');

type Settled = { ok: true; value: unknown } | { ok: false; error: unknown };

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Run `fn` on a later macrotask unless `signal` has aborted by then.
 */
function runDeferred(fn: () => unknown, signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve, reject) => {
    setImmediate(() => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      try {
        resolve(fn());
      } catch (error) {
        reject(error);
      }
    });
  });
}

/**
 * Normalize a job target and its arguments into a thunk.
 *
 * Plain functions are deferred, not offloaded: they still run on the event
 * loop thread and block every other job and timer until they return. Submit
 * CPU-bound work as a promise from a worker thread instead.
 *
 * @throws SchedulerError `invalid-argument` for a promise with arguments, or a
 *   target that is neither a function nor a promise
 */
export function normalizeTarget(target: unknown, args: readonly unknown[]): JobThunk {
  if (typeof target === 'function') {
    if (types.isAsyncFunction(target)) {
      return async () => Reflect.apply(target, undefined, args);
    }
    return (signal) => runDeferred(() => Reflect.apply(target, undefined, args), signal);
  }

  if (isPromiseLike(target)) {
    const settled: Promise<Settled> = Promise.resolve(target).then(
      (value) => ({ ok: true, value }),
      (error: unknown) => ({ ok: false, error }),
    );

    if (args.length > 0) {
      void settled.then((outcome) => {
        if (!outcome.ok) {
          log.debug('Rejected promise target was never scheduled', outcome.error);
        }
      });
      throw new SchedulerError(
        'invalid-argument',
        `Arguments are not supported when the job target is a promise (got ${args.length})`,
      );
    }

    return async () => {
      const outcome = await settled;
      if (!outcome.ok) {
        throw outcome.error;
      }
      return outcome.value;
    };
  }

  throw new SchedulerError(
    'invalid-argument',
    `Job target must be a function or a promise, got ${target === null ? 'null' : typeof target}`,
  );
}
