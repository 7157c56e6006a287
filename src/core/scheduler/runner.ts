/**
 * @fileoverview Job Runner - drives one job from pending to a terminal state.
 *
 * ```
 *   pending ──permit──▶ running ──▶ completed
 *      │                   ├──────▶ failed
 *      └─────────────────▶ └──────▶ canceled
 * ```
 *
 * The runner acquires a limiter permit, marks the job running, executes the
 * normalized thunk inside the job context and records the outcome. A job
 * body's exception is always captured into the record; `run` itself never
 * rejects, which lets its promise serve as the job's completion handle.
 *
 * Cancellation is recorded as soon as it is observed, but the permit is held
 * until the body's own promise settles, so a body that ignores its signal
 * still counts against the concurrency ceiling.
 *
 * @module core/scheduler/runner
 */

import { validate as isUuid } from 'uuid';
import type { ILogger } from '../../interfaces/ILogger';
import { Logger } from '../logger';
import { runInJobContext } from './jobContext';
import { ConcurrencyLimiter, Permit, acquirePermit } from './limiter';
import type { JobRegistry } from './registry';
import type { CorrelationIdMatcher, JobThunk } from './types';

/**
 * Summary and full diagnostic text of a job body's failure.
 */
export interface CapturedFailure {
  /** `<name>: <message>` */
  summary: string;
  /** Stack text, or the summary when the thrown value has none */
  traceback: string;
}

/**
 * Reduce any thrown value to a summary and a traceback.
 */
export function captureFailure(error: unknown): CapturedFailure {
  if (error instanceof Error) {
    const summary = error.message ? `${error.name}: ${error.message}` : error.name;
    return { summary, traceback: error.stack || summary };
  }
  const summary = `Thrown ${typeof error}: ${String(error)}`;
  return { summary, traceback: summary };
}

/**
 * Default correlation id recognition: any UUID string.
 */
export const isUuidString: CorrelationIdMatcher = (value: unknown): value is string =>
  typeof value === 'string' && isUuid(value);

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts,
 * whichever comes first. A late rejection of `work` is absorbed.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export interface JobRunnerOptions {
  /** Recognizes identifiers among return values; defaults to {@link isUuidString} */
  isCorrelationId?: CorrelationIdMatcher;
  logger?: ILogger;
}

/**
 * Executes jobs against a {@link JobRegistry}.
 */
export class JobRunner {
  private readonly isCorrelationId: CorrelationIdMatcher;
  private readonly log: ILogger;

  constructor(
    private readonly registry: JobRegistry,
    options: JobRunnerOptions = {},
  ) {
    this.isCorrelationId = options.isCorrelationId ?? isUuidString;
    this.log = options.logger ?? Logger.for('runner');
  }

  /**
   * Run one job to completion.
   *
   * @param id - Job id, already inserted as pending
   * @param thunk - Normalized job body
   * @param signal - Aborts on cancellation
   * @param limiter - Limiter current when the job was launched
   */
  async run(id: string, thunk: JobThunk, signal: AbortSignal, limiter: ConcurrencyLimiter | undefined): Promise<void> {
    let permit: Permit | undefined;
    try {
      permit = await acquirePermit(limiter, signal);
      signal.throwIfAborted();

      if (!this.registry.transition(id, 'running')) {
        return;
      }

      // The slot stays taken until the body itself settles, even after a
      // cancel has already marked the job canceled.
      const work = runInJobContext({ jobId: id, signal }, () => thunk(signal));
      const held = permit;
      permit = undefined;
      void work.then(() => held.release(), () => held.release());

      const result = await raceAbort(work, signal);
      const correlationId = this.isCorrelationId(result) ? result : undefined;
      this.registry.complete(id, result, correlationId);
      this.log.debug(`Job ${id} completed`);
    } catch (error) {
      if (signal.aborted) {
        this.registry.transition(id, 'canceled');
        this.log.debug(`Job ${id} canceled`);
        return;
      }
      const failure = captureFailure(error);
      this.registry.transition(id, 'failed', { error: failure.summary, errorTraceback: failure.traceback });
      this.log.warn(`Job ${id} failed: ${failure.summary}`);
    } finally {
      permit?.release();
    }
  }
}
