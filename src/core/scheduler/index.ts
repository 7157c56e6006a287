/**
 * @fileoverview Scheduler module exports.
 *
 * ```
 *   JobScheduler ──▶ normalizeTarget ──▶ JobThunk
 *        │
 *        ├──▶ JobRunner ──▶ ConcurrencyLimiter (permit)
 *        │        │
 *        └────────┴──▶ JobRegistry (records, results, handles)
 * ```
 *
 * @module core/scheduler
 */

export type {
  CorrelationIdMatcher,
  JobFunction,
  JobRecord,
  JobRecordFilter,
  JobRecordPatch,
  JobStatus,
  JobTarget,
  JobThunk,
  JobTransitionEvent,
  SerializedJobRecord,
} from './types';
export {
  JOB_STATUSES,
  TERMINAL_STATES,
  VALID_TRANSITIONS,
  isTerminalStatus,
  isValidTransition,
  jobRecordListSchema,
  jobRecordSchema,
  serializeJobRecord,
} from './types';

export type { Permit } from './limiter';
export { ConcurrencyLimiter, acquirePermit, createLimiter } from './limiter';

export type { JobContext } from './jobContext';
export { currentJob, runInJobContext } from './jobContext';

export { isPromiseLike, normalizeTarget } from './target';

export type { JobHandle, JobRegistryEvents } from './registry';
export { JobRegistry } from './registry';

export type { CapturedFailure, JobRunnerOptions } from './runner';
export { JobRunner, captureFailure, isUuidString } from './runner';

export type { JobSchedulerEvents, JobSchedulerOptions } from './jobScheduler';
export { JobScheduler } from './jobScheduler';

export type { JobWatchEvent, WatchOptions } from './watch';
export { watchJob } from './watch';
