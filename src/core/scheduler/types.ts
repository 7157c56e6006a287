/**
 * @fileoverview Scheduler Types - Job records, lifecycle states and targets.
 *
 * @module core/scheduler/types
 */

// ============================================================================
// JOB STATUS
// ============================================================================

/**
 * Status of a job.
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'canceled';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'completed', 'failed', 'canceled'];

/**
 * Terminal states - no transitions out
 */
export const TERMINAL_STATES: readonly JobStatus[] = ['completed', 'failed', 'canceled'];

/**
 * Valid state transitions
 */
export const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  'pending':   ['running', 'canceled'],
  'running':   ['completed', 'failed', 'canceled'],
  'completed': [],  // Terminal
  'failed':    [],  // Terminal
  'canceled':  [],  // Terminal
};

/**
 * Check if a status represents a terminal (finished) state.
 */
export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATES.includes(status);
}

/**
 * Check if a state transition is allowed by the transition table.
 */
export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// ============================================================================
// JOB RECORD
// ============================================================================

/**
 * Externally observable snapshot of one job.
 *
 * Timestamps are epoch milliseconds and are written at most once, so
 * `submittedAt <= startedAt <= finishedAt` holds wherever they are present.
 */
export interface JobRecord {
  /** Time-ordered unique identifier (UUIDv7) */
  id: string;
  /** Current status */
  status: JobStatus;
  /** When the job was submitted */
  submittedAt: number;
  /** When the job body started running */
  startedAt?: number;
  /** When the job reached a terminal state */
  finishedAt?: number;
  /** Short failure summary (`<name>: <message>`), failure only */
  error?: string;
  /** Full stack text, failure only */
  errorTraceback?: string;
  /** Identifier returned by the job body, when it returned one */
  correlationId?: string;
}

/**
 * Fields the runner may set alongside a transition.
 */
export type JobRecordPatch = Partial<Pick<JobRecord, 'error' | 'errorTraceback' | 'correlationId'>>;

/**
 * Filter for record listings.
 */
export interface JobRecordFilter {
  status?: JobStatus;
}

/**
 * Emitted on every accepted status change.
 */
export interface JobTransitionEvent {
  jobId: string;
  from: JobStatus;
  to: JobStatus;
  /** Copy of the record after the transition */
  record: JobRecord;
}

// ============================================================================
// JOB TARGETS
// ============================================================================

/**
 * A function job body, sync or async.
 */
export type JobFunction<A extends unknown[] = unknown[], R = unknown> = (...args: A) => R | PromiseLike<R>;

/**
 * Anything `addJob` accepts as its first argument.
 */
export type JobTarget = ((...args: never[]) => unknown) | PromiseLike<unknown>;

/**
 * Uniform execution shape every target is normalized into at submission.
 * The signal aborts when cancellation is requested.
 */
export type JobThunk = (signal: AbortSignal) => Promise<unknown>;

/**
 * Decides whether a job's return value is an identifier worth attaching to
 * the record as `correlationId`.
 */
export type CorrelationIdMatcher = (value: unknown) => value is string;

// ============================================================================
// SERIALIZED FORM
// ============================================================================

/**
 * JSON-friendly record with ISO-8601 timestamps, for polling and push layers.
 */
export interface SerializedJobRecord {
  id: string;
  status: JobStatus;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
  errorTraceback: string | null;
  correlationId: string | null;
}

function isoOrNull(value: number | undefined): string | null {
  return value === undefined ? null : new Date(value).toISOString();
}

export function serializeJobRecord(record: JobRecord): SerializedJobRecord {
  return {
    id: record.id,
    status: record.status,
    submittedAt: new Date(record.submittedAt).toISOString(),
    startedAt: isoOrNull(record.startedAt),
    finishedAt: isoOrNull(record.finishedAt),
    error: record.error ?? null,
    errorTraceback: record.errorTraceback ?? null,
    correlationId: record.correlationId ?? null,
  };
}

const ISO_TIMESTAMP = '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z$';

/**
 * JSON Schema for {@link SerializedJobRecord}.
 */
export const jobRecordSchema = {
  $id: 'jobkit/job-record',
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
    status: { type: 'string', enum: [...JOB_STATUSES] },
    submittedAt: { type: 'string', pattern: ISO_TIMESTAMP },
    startedAt: { type: ['string', 'null'], pattern: ISO_TIMESTAMP },
    finishedAt: { type: ['string', 'null'], pattern: ISO_TIMESTAMP },
    error: { type: ['string', 'null'] },
    errorTraceback: { type: ['string', 'null'] },
    correlationId: { type: ['string', 'null'] },
  },
  required: ['id', 'status', 'submittedAt', 'startedAt', 'finishedAt', 'error', 'errorTraceback', 'correlationId'],
  additionalProperties: false,
};

/**
 * JSON Schema for a record listing.
 */
export const jobRecordListSchema = {
  $id: 'jobkit/job-record-list',
  type: 'array',
  items: { $ref: 'job-record' },
};
