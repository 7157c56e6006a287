/**
 * @fileoverview Shared helpers for scheduler unit tests.
 */

import { Logger } from '../../../core/logger';

/**
 * Initialize the logger so only errors reach the console.
 */
export function quietLogs(): void {
  Logger.reset();
  Logger.initialize({ level: 'error', debug: [] });
}

/**
 * Resolve after every queued microtask and the next macrotask turn.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

/**
 * Promise whose settlement the test controls.
 */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Error subclass whose name shows up in failure summaries. */
export class ValueError extends Error {
  override name = 'ValueError';
}
