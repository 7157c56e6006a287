/**
 * @fileoverview jobkit public API.
 *
 * @example
 * ```typescript
 * import { JobScheduler } from 'jobkit';
 *
 * const scheduler = new JobScheduler({ maxConcurrency: 2 });
 * const id = scheduler.addJob(async () => 42);
 * await scheduler.wait(id);
 * scheduler.getResult(id); // 42
 * ```
 *
 * @module jobkit
 */

export * from './core';
export type { IConfigProvider, IJobScheduler, ILogger } from './interfaces';
export { createContainer } from './composition';
