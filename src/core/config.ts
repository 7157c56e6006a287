/**
 * @fileoverview Configuration loading.
 *
 * Configuration is read key by key from an {@link IConfigProvider}, then
 * coerced, defaulted and validated as a whole with Ajv.
 *
 * | Section            | Key              | Environment variable                | Default    |
 * |--------------------|------------------|-------------------------------------|------------|
 * | `jobkit.scheduler` | `name`           | `JOBKIT_SCHEDULER_NAME`             | `'jobkit'` |
 * | `jobkit.scheduler` | `maxConcurrency` | `JOBKIT_SCHEDULER_MAX_CONCURRENCY`  | `null`     |
 * | `jobkit.logging`   | `level`          | `JOBKIT_LOGGING_LEVEL`              | `'info'`   |
 * | `jobkit.logging`   | `debug`          | `JOBKIT_LOGGING_DEBUG` (comma list) | `[]`       |
 *
 * An empty `JOBKIT_SCHEDULER_MAX_CONCURRENCY` means unbounded.
 *
 * @module core/config
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import { LOG_COMPONENTS, LOG_LEVELS, Logger, LoggingConfig } from './logger';
import { assertValid, configAjv, strictAjv } from './validation';

const log = Logger.for('config');

export const SCHEDULER_SECTION = 'jobkit.scheduler';
export const LOGGING_SECTION = 'jobkit.logging';

/**
 * Scheduler settings.
 */
export interface SchedulerConfig {
  /** Used in log lines */
  name: string;
  /** Ceiling on simultaneously running jobs; null, zero or negative means unbounded */
  maxConcurrency: number | null;
}

/**
 * Fully loaded configuration.
 */
export interface Configuration {
  scheduler: SchedulerConfig;
  logging: LoggingConfig;
}

const schedulerProperties = {
  name: { type: 'string', minLength: 1, default: 'jobkit' },
  maxConcurrency: { type: ['integer', 'null'], default: null },
};

const configurationSchema = {
  type: 'object',
  properties: {
    scheduler: {
      type: 'object',
      properties: schedulerProperties,
      additionalProperties: false,
      default: {},
    },
    logging: {
      type: 'object',
      properties: {
        level: { type: 'string', enum: [...LOG_LEVELS], default: 'info' },
        debug: { type: 'array', items: { type: 'string', enum: [...LOG_COMPONENTS] }, default: [] },
      },
      additionalProperties: false,
      default: {},
    },
  },
  additionalProperties: false,
};

const validateConfiguration = configAjv.compile<Configuration>(configurationSchema);

/**
 * Validator for scheduler options passed in code. Both fields are optional
 * here; {@link DEFAULT_SCHEDULER_CONFIG} fills the gaps.
 */
export const validateSchedulerSettings = strictAjv.compile<Partial<SchedulerConfig>>({
  type: 'object',
  properties: {
    name: schedulerProperties.name,
    maxConcurrency: schedulerProperties.maxConcurrency,
  },
  additionalProperties: false,
});

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  name: 'jobkit',
  maxConcurrency: null,
};

/**
 * Environment variable name for a configuration key.
 *
 * @example
 * ```typescript
 * toEnvName('jobkit.scheduler', 'maxConcurrency'); // 'JOBKIT_SCHEDULER_MAX_CONCURRENCY'
 * ```
 */
export function toEnvName(section: string, key: string): string {
  return `${section}.${key}`
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .toUpperCase();
}

/**
 * Reads configuration from environment variables.
 */
export class EnvConfigProvider implements IConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig(section: string, key: string): string | undefined {
    return this.env[toEnvName(section, key)];
  }
}

/**
 * In-memory configuration, keyed by `section.key`.
 */
export class MapConfigProvider implements IConfigProvider {
  private readonly values = new Map<string, unknown>();

  constructor(values: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(values)) {
      this.values.set(key, value);
    }
  }

  set(section: string, key: string, value: unknown): void {
    this.values.set(`${section}.${key}`, value);
  }

  getConfig(section: string, key: string): unknown {
    return this.values.get(`${section}.${key}`);
  }
}

function compact(entries: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function splitList(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Load, coerce and validate configuration.
 *
 * @throws SchedulerError `invalid-argument` listing every invalid value
 */
export function loadConfiguration(provider: IConfigProvider): Configuration {
  const raw: unknown = {
    scheduler: compact({
      name: provider.getConfig(SCHEDULER_SECTION, 'name'),
      maxConcurrency: provider.getConfig(SCHEDULER_SECTION, 'maxConcurrency'),
    }),
    logging: compact({
      level: provider.getConfig(LOGGING_SECTION, 'level'),
      debug: splitList(provider.getConfig(LOGGING_SECTION, 'debug')),
    }),
  };

  assertValid(validateConfiguration, raw, 'configuration');
  log.debug('Configuration loaded', raw);
  return raw;
}
