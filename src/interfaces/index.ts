/**
 * @fileoverview Central export for all interfaces.
 *
 * @module interfaces
 */

export * from './IConfigProvider';
export * from './IJobScheduler';
export * from './ILogger';
