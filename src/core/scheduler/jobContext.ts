/**
 * @fileoverview Ambient job context for running job bodies.
 *
 * Job functions receive only their own arguments. A body that wants to
 * cooperate with cancellation reads its context instead:
 *
 * ```typescript
 * scheduler.addJob(async (url: string) => {
 *   const { signal } = currentJob() ?? {};
 *   const res = await fetch(url, { signal });
 *   return res.json();
 * }, 'https://example.test/data');
 * ```
 *
 * @module core/scheduler/jobContext
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface JobContext {
  jobId: string;
  /** Aborts when cancellation of the job is requested */
  signal: AbortSignal;
}

const storage = new AsyncLocalStorage<JobContext>();

/**
 * Context of the job whose body is currently executing, or `undefined`
 * outside a job.
 */
export function currentJob(): JobContext | undefined {
  return storage.getStore();
}

export function runInJobContext<T>(context: JobContext, fn: () => T): T {
  return storage.run(context, fn);
}
