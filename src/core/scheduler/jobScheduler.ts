/**
 * @fileoverview Job Scheduler - in-process scheduling façade.
 *
 * Accepts work, assigns it a time-ordered id, runs it in the background
 * under an optional concurrency ceiling and keeps its record queryable until
 * it is deleted.
 *
 * Key Principles:
 * - `addJob` returns the id synchronously; nothing of the job body has run
 *   by then.
 * - Waiting, timing out and abandoning a wait never affect the job. Only
 *   `cancel` and `delete` do.
 * - A job body's exception is captured on its record and resurfaces only
 *   through {@link JobScheduler.getResult}.
 *
 * @module core/scheduler/jobScheduler
 */

import { EventEmitter } from 'events';
import { v7 as uuidv7 } from 'uuid';
import type { IJobScheduler } from '../../interfaces/IJobScheduler';
import type { ILogger } from '../../interfaces/ILogger';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig, validateSchedulerSettings } from '../config';
import { JobFailureError, SchedulerError, jobNotFound } from '../errors';
import { Logger } from '../logger';
import { assertValid, strictAjv } from '../validation';
import { ConcurrencyLimiter, createLimiter } from './limiter';
import { JobRegistry, JobHandle } from './registry';
import { JobRunner } from './runner';
import { normalizeTarget } from './target';
import {
  CorrelationIdMatcher,
  JobFunction,
  JobRecord,
  JobRecordFilter,
  JobStatus,
  JobTransitionEvent,
  isTerminalStatus,
} from './types';

/**
 * Events emitted by the scheduler
 */
export interface JobSchedulerEvents {
  /** Every accepted status change, re-emitted from the registry */
  'transition': (event: JobTransitionEvent) => void;
}

/**
 * Scheduler options.
 */
export interface JobSchedulerOptions {
  /** Used in log lines. Default `'jobkit'` */
  name?: string;
  /** Ceiling on simultaneously running jobs; null, zero or negative means unbounded */
  maxConcurrency?: number | null;
  /** Recognizes identifiers among return values. Default: any UUID string */
  isCorrelationId?: CorrelationIdMatcher;
  logger?: ILogger;
}

const validateMaxConcurrency = strictAjv.compile<number | null>({ type: ['integer', 'null'] });

/**
 * In-process job scheduler.
 *
 * @example
 * ```typescript
 * const scheduler = new JobScheduler({ maxConcurrency: 4 });
 * const id = scheduler.addJob(async (url: string) => fetchReport(url), 'https://example.test/report');
 * await scheduler.wait(id, 5_000);
 * console.log(scheduler.getRecord(id).status); // 'completed'
 * ```
 */
export class JobScheduler extends EventEmitter implements IJobScheduler {
  readonly name: string;

  private readonly registry = new JobRegistry();
  private readonly runner: JobRunner;
  private readonly log: ILogger;
  private limiter: ConcurrencyLimiter | undefined;

  constructor(options: JobSchedulerOptions = {}) {
    super();
    const settings: Partial<SchedulerConfig> = {};
    if (options.name !== undefined) settings.name = options.name;
    if (options.maxConcurrency !== undefined) settings.maxConcurrency = options.maxConcurrency;
    assertValid(validateSchedulerSettings, settings, 'scheduler options');

    this.name = settings.name ?? DEFAULT_SCHEDULER_CONFIG.name;
    this.log = options.logger ?? Logger.for('scheduler');
    this.limiter = createLimiter(settings.maxConcurrency ?? DEFAULT_SCHEDULER_CONFIG.maxConcurrency);
    this.runner = new JobRunner(this.registry, {
      isCorrelationId: options.isCorrelationId,
      logger: options.logger,
    });

    this.registry.on('transition', (event: JobTransitionEvent) => this.emit('transition', event));
    this.log.info(`Scheduler ${this.name} created`, { maxConcurrency: this.maxConcurrency });
  }

  // ============================================================================
  // CONCURRENCY
  // ============================================================================

  get maxConcurrency(): number | null {
    return this.limiter?.max ?? null;
  }

  /** Jobs currently holding a slot; 0 when unbounded */
  get activeCount(): number {
    return this.limiter?.active ?? 0;
  }

  /** Jobs waiting for a slot; 0 when unbounded */
  get waitingCount(): number {
    return this.limiter?.waiting ?? 0;
  }

  /**
   * Replace the concurrency ceiling.
   *
   * Jobs already launched keep the limiter they were launched with; the new
   * ceiling applies to jobs submitted afterwards.
   *
   * @throws SchedulerError `invalid-argument` unless `n` is an integer, null or undefined
   */
  setMaxConcurrency(n: number | null | undefined): void {
    const value = n ?? null;
    assertValid(validateMaxConcurrency, value, 'maxConcurrency');
    this.limiter = createLimiter(value);
    this.log.info(`Scheduler ${this.name} concurrency set to ${this.maxConcurrency ?? 'unbounded'}`);
  }

  // ============================================================================
  // SUBMISSION
  // ============================================================================

  addJob<R>(target: PromiseLike<R>): string;
  addJob<A extends unknown[], R>(target: JobFunction<A, R>, ...args: A): string;
  addJob(target: unknown, ...args: unknown[]): string {
    const thunk = normalizeTarget(target, args);
    const id = uuidv7();

    this.registry.insert({ id, status: 'pending', submittedAt: Date.now() });

    const controller = new AbortController();
    const done = this.runner.run(id, thunk, controller.signal, this.limiter);
    this.registry.attachHandle(id, { controller, done });

    this.log.debug(`Job ${id} submitted to ${this.name}`);
    return id;
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  getStatus(id: string): JobStatus {
    const status = this.registry.status(id);
    if (status === undefined) {
      throw jobNotFound(id);
    }
    return status;
  }

  getRecord(id: string): JobRecord {
    const record = this.registry.snapshot(id);
    if (!record) {
      throw jobNotFound(id);
    }
    return record;
  }

  getAllRecords(filter: JobRecordFilter = {}): JobRecord[] {
    const records = this.registry.list();
    if (filter.status === undefined) {
      return records;
    }
    return records.filter((record) => record.status === filter.status);
  }

  getResult(id: string): unknown {
    const record = this.getRecord(id);
    switch (record.status) {
      case 'completed':
        return this.registry.result(id);
      case 'failed':
        throw new JobFailureError(id, record.error ?? 'Job failed', record.errorTraceback ?? '');
      default:
        throw new SchedulerError('not-finished', `Job not finished (status=${record.status})`, id);
    }
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  async cancel(id: string): Promise<boolean> {
    const handle = this.requireHandle(id);
    if (isTerminalStatus(this.getStatus(id))) {
      return false;
    }

    handle.controller.abort();
    await handle.done;

    const canceled = this.registry.status(id) === 'canceled';
    this.log.debug(`Cancel ${id}: ${canceled ? 'canceled' : 'finished first'}`);
    return canceled;
  }

  async delete(id: string): Promise<void> {
    const handle = this.requireHandle(id);
    if (!isTerminalStatus(this.getStatus(id))) {
      handle.controller.abort();
    }
    await handle.done;

    this.registry.remove(id);
    this.log.debug(`Job ${id} deleted`);
  }

  async wait(id: string, timeoutMs?: number): Promise<void> {
    const { done } = this.requireHandle(id);
    if (timeoutMs === undefined) {
      return done;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new SchedulerError('timeout', `Timed out after ${timeoutMs}ms waiting for job ${id}`, id)),
        timeoutMs,
      );
    });

    try {
      await Promise.race([done, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private requireHandle(id: string): JobHandle {
    const handle = this.registry.handle(id);
    if (!handle) {
      throw jobNotFound(id);
    }
    return handle;
  }
}
