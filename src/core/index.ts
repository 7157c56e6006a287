/**
 * @fileoverview Core module exports.
 *
 * Central exports for core business logic components.
 *
 * @module core
 */

export type { LogComponent, LogLevel, LoggingConfig } from './logger';
export { LOG_COMPONENTS, LOG_LEVELS, Logger, ComponentLogger } from './logger';
export type { SchedulerErrorKind } from './errors';
export { SchedulerError, JobFailureError, isSchedulerError, jobNotFound } from './errors';
export type { Configuration, SchedulerConfig } from './config';
export {
  DEFAULT_SCHEDULER_CONFIG,
  EnvConfigProvider,
  LOGGING_SECTION,
  MapConfigProvider,
  SCHEDULER_SECTION,
  loadConfiguration,
  toEnvName,
} from './config';
export { assertValid, formatErrors, validateSerializedRecord, validateSerializedRecordList } from './validation';
export type { ServiceFactory, ServiceRegistration } from './container';
export { ServiceContainer, ServiceToken } from './container';
export * as Tokens from './tokens';
export * from './scheduler';
