/**
 * @fileoverview Job Registry - the single owner of id-keyed job state.
 *
 * Holds three maps keyed by job id: records, results of completed jobs, and
 * execution handles. Nothing else in the scheduler keeps per-job mutable
 * state.
 *
 * Key Principles:
 * - Every mutating method is synchronous, so each one runs to completion on
 *   the event loop before any other job or caller observes the maps. This is
 *   the registry's exclusive guard; no method may await.
 * - Reads hand out copies, never the stored record.
 * - Status changes go through {@link JobRegistry.transition}, which enforces
 *   the transition table and write-once timestamp and error fields.
 * - Listeners run after the change is committed; one that throws is logged
 *   and never undoes or alters the transition.
 *
 * @module core/scheduler/registry
 */

import { EventEmitter } from 'events';
import { SchedulerError } from '../errors';
import { Logger } from '../logger';
import {
  JobRecord,
  JobRecordPatch,
  JobStatus,
  JobTransitionEvent,
  isTerminalStatus,
  isValidTransition,
} from './types';

const log = Logger.for('registry');

/**
 * Events emitted by the registry
 */
export interface JobRegistryEvents {
  'transition': (event: JobTransitionEvent) => void;
}

/**
 * Internal execution bookkeeping for one job. Never exposed to callers.
 */
export interface JobHandle {
  /** Aborting requests cooperative cancellation */
  controller: AbortController;
  /** Settles (never rejects) once the runner has finished with the job */
  done: Promise<void>;
}

/**
 * Registry of job records, results and handles.
 *
 * @example
 * ```typescript
 * const registry = new JobRegistry();
 * registry.on('transition', (evt) => console.log(`${evt.jobId}: ${evt.from} → ${evt.to}`));
 * registry.insert({ id, status: 'pending', submittedAt: Date.now() });
 * registry.transition(id, 'running');
 * ```
 */
export class JobRegistry extends EventEmitter {
  private readonly records = new Map<string, JobRecord>();
  private readonly results = new Map<string, unknown>();
  private readonly handles = new Map<string, JobHandle>();

  get size(): number {
    return this.records.size;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * Add a new record.
   *
   * @throws SchedulerError `already-scheduled` if the id is taken
   */
  insert(record: JobRecord): void {
    if (this.records.has(record.id) || this.handles.has(record.id)) {
      throw new SchedulerError('already-scheduled', `Job ${record.id} already scheduled`, record.id);
    }
    this.records.set(record.id, { ...record });
    log.debug(`Inserted job ${record.id}`);
  }

  attachHandle(id: string, handle: JobHandle): void {
    this.handles.set(id, handle);
  }

  handle(id: string): JobHandle | undefined {
    return this.handles.get(id);
  }

  /**
   * Copy of a record, or `undefined` if unknown.
   */
  snapshot(id: string): JobRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  status(id: string): JobStatus | undefined {
    return this.records.get(id)?.status;
  }

  /**
   * Copies of every record, most recently submitted first. Records submitted
   * in the same millisecond keep reverse submission order.
   */
  list(): JobRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }))
      .reverse()
      .sort((a, b) => b.submittedAt - a.submittedAt);
  }

  /**
   * Transition a job to a new status.
   *
   * Sets `startedAt` on entering `running` and `finishedAt` on entering a
   * terminal state. Error fields are only accepted with `failed`, the
   * correlation id only with `completed`; every field is written at most once.
   *
   * @returns true if transition succeeded, false if invalid or unknown
   */
  transition(id: string, to: JobStatus, patch?: JobRecordPatch, now: number = Date.now()): boolean {
    const record = this.records.get(id);
    if (!record) {
      log.warn(`Cannot transition unknown job: ${id}`, { to });
      return false;
    }

    const from = record.status;
    if (!isValidTransition(from, to)) {
      log.warn(`Invalid transition rejected: ${id} ${from} -> ${to}`);
      return false;
    }

    record.status = to;
    if (to === 'running' && record.startedAt === undefined) {
      record.startedAt = Math.max(now, record.submittedAt);
    }
    if (isTerminalStatus(to) && record.finishedAt === undefined) {
      record.finishedAt = Math.max(now, record.startedAt ?? record.submittedAt);
    }
    if (to === 'failed' && patch?.error !== undefined) {
      record.error ??= patch.error;
    }
    if (to === 'failed' && patch?.errorTraceback !== undefined) {
      record.errorTraceback ??= patch.errorTraceback;
    }
    if (to === 'completed' && patch?.correlationId !== undefined) {
      record.correlationId ??= patch.correlationId;
    }

    log.debug(`Job transition: ${id} ${from} -> ${to}`);
    try {
      this.emit('transition', { jobId: id, from, to, record: { ...record } } satisfies JobTransitionEvent);
    } catch (error) {
      log.error(`Transition listener failed for job ${id} (${from} -> ${to})`, error);
    }
    return true;
  }

  /**
   * Store the return value of a job and mark it completed, as one step.
   */
  complete(id: string, value: unknown, correlationId?: string): boolean {
    const status = this.records.get(id)?.status;
    if (status === undefined || !isValidTransition(status, 'completed')) {
      return this.transition(id, 'completed');
    }
    this.results.set(id, value);
    return this.transition(id, 'completed', { correlationId });
  }

  /**
   * Stored return value; only completed jobs have one.
   */
  result(id: string): unknown {
    return this.results.get(id);
  }

  /**
   * Forget a job entirely.
   *
   * @returns true if a record was removed
   */
  remove(id: string): boolean {
    this.results.delete(id);
    this.handles.delete(id);
    const removed = this.records.delete(id);
    if (removed) {
      log.debug(`Removed job ${id}`);
    }
    return removed;
  }
}
