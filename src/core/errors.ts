/**
 * @fileoverview Scheduler error taxonomy.
 *
 * Every condition the scheduler itself raises carries one {@link SchedulerErrorKind}.
 * A job body's own exception is never turned into one of these kinds until a
 * caller asks for the result of the failed job, at which point it resurfaces as
 * a {@link JobFailureError} carrying the captured summary and stack text.
 *
 * @module core/errors
 */

/**
 * Closed set of scheduler error kinds.
 */
export type SchedulerErrorKind =
  | 'not-found'
  | 'invalid-argument'
  | 'already-scheduled'
  | 'not-finished'
  | 'timeout'
  | 'job-failure';

/**
 * Error raised by scheduler operations.
 *
 * @example
 * ```typescript
 * try {
 *   scheduler.getRecord(id);
 * } catch (err) {
 *   if (isSchedulerError(err, 'not-found')) { ... }
 * }
 * ```
 */
export class SchedulerError extends Error {
  override readonly name: string = 'SchedulerError';

  constructor(
    readonly kind: SchedulerErrorKind,
    message: string,
    readonly jobId?: string,
  ) {
    super(message);
  }
}

/**
 * Raised by `getResult` for a job whose body threw.
 */
export class JobFailureError extends SchedulerError {
  override readonly name: string = 'JobFailureError';

  constructor(
    jobId: string,
    summary: string,
    /** Full stack text captured when the job failed */
    readonly traceback: string,
  ) {
    super('job-failure', summary, jobId);
  }
}

export function isSchedulerError(value: unknown, kind?: SchedulerErrorKind): value is SchedulerError {
  return value instanceof SchedulerError && (kind === undefined || value.kind === kind);
}

export function jobNotFound(jobId: string): SchedulerError {
  return new SchedulerError('not-found', `Job not found: ${jobId}`, jobId);
}
