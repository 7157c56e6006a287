/**
 * @fileoverview Service tokens for dependency injection container.
 *
 * Each token corresponds to an interface in src/interfaces/ or a loaded
 * configuration object.
 *
 * @module core/tokens
 */

import type { IConfigProvider as ConfigProviderService } from '../interfaces/IConfigProvider';
import type { IJobScheduler as JobSchedulerService } from '../interfaces/IJobScheduler';
import type { ILogger as LoggerService } from '../interfaces/ILogger';
import type { Configuration as ConfigurationValue } from './config';
import { ServiceToken } from './container';

/**
 * Token for IConfigProvider service.
 * Raw configuration source (environment, in-memory map).
 */
export const IConfigProvider = new ServiceToken<ConfigProviderService>('IConfigProvider');

/**
 * Token for the validated {@link ConfigurationValue}.
 */
export const Configuration = new ServiceToken<ConfigurationValue>('Configuration');

/**
 * Token for ILogger service.
 */
export const ILogger = new ServiceToken<LoggerService>('ILogger');

/**
 * Token for IJobScheduler service.
 */
export const IJobScheduler = new ServiceToken<JobSchedulerService>('IJobScheduler');
