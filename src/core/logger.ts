/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * Log lines go to the console: errors and warnings on stderr, everything else
 * on stdout. Debug logging is enabled per component through configuration
 * (`JOBKIT_LOGGING_DEBUG=scheduler,runner`), and a minimum level filters the
 * rest (`JOBKIT_LOGGING_LEVEL=warn`).
 *
 * Components:
 * - scheduler: public scheduler operations
 * - runner: per-job execution and state transitions
 * - limiter: permit acquisition and release
 * - registry: record bookkeeping
 * - config: configuration loading
 * - watch: record watchers
 * - composition: container wiring
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('scheduler');
 * log.info('Scheduler created');
 * log.debug('Permit acquired', { jobId });
 * log.error('Transition rejected', error);
 * ```
 *
 * @module core/logger
 */

import type { ILogger } from '../interfaces/ILogger';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Components that can have logging enabled
 */
export type LogComponent = 'scheduler' | 'runner' | 'limiter' | 'registry' | 'config' | 'watch' | 'composition';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const LOG_COMPONENTS: readonly LogComponent[] = [
  'scheduler',
  'runner',
  'limiter',
  'registry',
  'config',
  'watch',
  'composition',
];

/**
 * Logging settings, usually taken from the loaded configuration.
 */
export interface LoggingConfig {
  /** Minimum level written for non-debug output */
  level: LogLevel;
  /** Components with debug output enabled */
  debug: LogComponent[];
}

/**
 * Centralized logger with per-component debug control.
 */
export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = 'info';
  private debugComponents = new Set<LogComponent>();

  private constructor(config?: LoggingConfig) {
    if (config) {
      this.configure(config);
    }
  }

  /**
   * Initialize the logger. Should be called once during startup; later calls
   * reconfigure the existing instance.
   */
  static initialize(config?: LoggingConfig): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config);
    } else if (config) {
      Logger.instance.configure(config);
    }
    return Logger.instance;
  }

  /**
   * Drop the singleton. Scoped loggers fall back to plain console output.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Get the singleton logger instance, if initialized.
   */
  static getInstance(): Logger | undefined {
    return Logger.instance;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   * @returns A ComponentLogger bound to the specified component
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Apply level and debug settings.
   */
  configure(config: LoggingConfig): void {
    this.level = config.level;
    this.debugComponents = new Set(config.debug);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.debugComponents.has(component);
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  /**
   * Format additional data for logging.
   */
  private formatData(data?: unknown): string {
    if (data === undefined) return '';
    if (data instanceof Error) {
      return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
    }
    try {
      return '\n  ' + JSON.stringify(data, null, 2).split('\n').join('\n  ');
    } catch {
      return `\n  [Unserializable data: ${typeof data}]`;
    }
  }

  private passesLevel(level: LogLevel, component: LogComponent): boolean {
    if (level === 'debug') {
      return this.isDebugEnabled(component);
    }
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  /**
   * Write a log entry.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (!this.passesLevel(level, component)) {
      return;
    }

    const line = this.formatMessage(level, component, message) + this.formatData(data);
    const consoleFn = level === 'error' ? console.error :
                      level === 'warn' ? console.warn :
                      level === 'debug' ? console.debug :
                      console.log;
    consoleFn(line);
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

/**
 * Component-scoped logger for convenience.
 *
 * Provides log methods pre-bound to a specific component. Before
 * {@link Logger.initialize} is called, info/warn/error go straight to the
 * console and debug output is dropped.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.getInstance()?.debug(this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.info(this.component, message, data);
    } else {
      console.log(`[jobkit:${this.component}] ${message}`, data ?? '');
    }
  }

  warn(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.warn(this.component, message, data);
    } else {
      console.warn(`[jobkit:${this.component}] ${message}`, data ?? '');
    }
  }

  error(message: string, data?: unknown): void {
    const instance = Logger.getInstance();
    if (instance) {
      instance.error(this.component, message, data);
    } else {
      console.error(`[jobkit:${this.component}] ${message}`, data ?? '');
    }
  }

  isDebugEnabled(): boolean {
    return Logger.getInstance()?.isDebugEnabled(this.component) ?? false;
  }
}
