/**
 * @fileoverview Interface for job scheduling and lifecycle management.
 *
 * This is the surface external layers (HTTP handlers, polling or push
 * endpoints, CLIs) consume. They never touch the registry or the runner
 * directly.
 *
 * @module interfaces/IJobScheduler
 */

import type { JobFunction, JobRecord, JobRecordFilter, JobStatus } from '../core/scheduler/types';

/**
 * Core interface for in-process job scheduling.
 *
 * @example
 * ```typescript
 * const id = scheduler.addJob(buildReport, 'weekly');
 * await scheduler.wait(id, 30_000);
 * const report = scheduler.getResult(id);
 * ```
 */
export interface IJobScheduler {
  /** Scheduler name, used in log lines */
  readonly name: string;

  /** Current concurrency ceiling, or `null` when unbounded */
  readonly maxConcurrency: number | null;

  /**
   * Submit an already-created promise. It takes no arguments.
   * @returns The new job id, before the job body runs
   */
  addJob<R>(target: PromiseLike<R>): string;

  /**
   * Submit a function with its positional arguments.
   * @returns The new job id, before the job body runs
   */
  addJob<A extends unknown[], R>(target: JobFunction<A, R>, ...args: A): string;

  /** @throws SchedulerError `not-found` for an unknown id */
  getStatus(id: string): JobStatus;

  /**
   * Point-in-time copy of a job record.
   * @throws SchedulerError `not-found` for an unknown id
   */
  getRecord(id: string): JobRecord;

  /**
   * Copies of all records, most recently submitted first.
   */
  getAllRecords(filter?: JobRecordFilter): JobRecord[];

  /**
   * Request cancellation and wait until the runner observes it.
   * @returns true if the job ended canceled, false if it was already terminal
   */
  cancel(id: string): Promise<boolean>;

  /**
   * Cancel the job if still active, then forget it.
   */
  delete(id: string): Promise<void>;

  /**
   * Wait for the job to reach a terminal state. Never cancels the job.
   * @throws SchedulerError `timeout` when `timeoutMs` elapses first
   */
  wait(id: string, timeoutMs?: number): Promise<void>;

  /**
   * Return value of a completed job.
   * @throws SchedulerError `not-finished` or JobFailureError
   */
  getResult(id: string): unknown;

  /**
   * Replace the concurrency ceiling. Running jobs keep their slots.
   */
  setMaxConcurrency(n: number | null | undefined): void;
}
