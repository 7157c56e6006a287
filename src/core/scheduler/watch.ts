/**
 * @fileoverview Record watcher for polling and push layers.
 *
 * Turns repeated `getRecord` calls into an async stream of events, so an SSE
 * or websocket handler can forward them without tracking job state itself.
 *
 * @module core/scheduler/watch
 */

import { setTimeout as sleep } from 'timers/promises';
import type { IJobScheduler } from '../../interfaces/IJobScheduler';
import { isSchedulerError } from '../errors';
import { Logger } from '../logger';
import { JobRecord, isTerminalStatus } from './types';

const log = Logger.for('watch');

export type JobWatchEvent =
  | { type: 'record'; record: JobRecord }
  | { type: 'deleted'; jobId: string };

export interface WatchOptions {
  /** Polling interval. Default 500 */
  intervalMs?: number;
  /** Ends the stream early, without an error */
  signal?: AbortSignal;
}

function poll(scheduler: IJobScheduler, id: string): JobRecord | undefined {
  try {
    return scheduler.getRecord(id);
  } catch (error) {
    if (isSchedulerError(error, 'not-found')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Stream snapshots of one job until it reaches a terminal state or is deleted.
 *
 * The first snapshot is taken before the generator is returned, so an unknown
 * id fails immediately.
 *
 * @throws SchedulerError `not-found` for an unknown id
 *
 * @example
 * ```typescript
 * for await (const event of watchJob(scheduler, id, { intervalMs: 250 })) {
 *   res.write(`data: ${JSON.stringify(event)}\n\n`);
 * }
 * ```
 */
export function watchJob(
  scheduler: IJobScheduler,
  id: string,
  options: WatchOptions = {},
): AsyncGenerator<JobWatchEvent, void, undefined> {
  const first = scheduler.getRecord(id);
  return stream(scheduler, first, options);
}

async function* stream(
  scheduler: IJobScheduler,
  first: JobRecord,
  { intervalMs = 500, signal }: WatchOptions,
): AsyncGenerator<JobWatchEvent, void, undefined> {
  const id = first.id;
  let record: JobRecord | undefined = first;

  while (record) {
    yield { type: 'record', record };
    if (isTerminalStatus(record.status)) {
      return;
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        log.debug(`Watch of job ${id} stopped`);
        return;
      }
      throw error;
    }

    record = poll(scheduler, id);
  }

  log.debug(`Watched job ${id} was deleted`);
  yield { type: 'deleted', jobId: id };
}
