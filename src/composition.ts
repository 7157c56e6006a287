/**
 * @fileoverview Composition root: DI container wiring.
 *
 * Creates a {@link ServiceContainer} with the production services registered.
 * This is the single place where concrete classes meet their interfaces.
 *
 * ## Dependency Graph
 *
 * ```
 * IConfigProvider  ──→ EnvConfigProvider (or the provider passed in)  (singleton)
 *   └─ used by: Configuration
 *
 * Configuration    ──→ loadConfiguration(IConfigProvider)             (singleton)
 *   └─ used by: Logger, IJobScheduler
 *
 * ILogger          ──→ Logger (ComponentLogger 'scheduler')           (singleton)
 *   └─ used by: IJobScheduler
 *
 * IJobScheduler    ──→ JobScheduler                                   (singleton)
 * ```
 *
 * @module composition
 */

import { EnvConfigProvider, loadConfiguration } from './core/config';
import { ServiceContainer } from './core/container';
import { Logger } from './core/logger';
import { JobScheduler } from './core/scheduler/jobScheduler';
import * as Tokens from './core/tokens';
import type { IConfigProvider } from './interfaces/IConfigProvider';

/**
 * Create and wire the production DI container.
 *
 * Configuration is loaded and the Logger initialized eagerly, so invalid
 * configuration fails here rather than on first use.
 *
 * @param provider - Configuration source; defaults to the process environment
 * @returns A fully-wired {@link ServiceContainer}
 * @throws SchedulerError `invalid-argument` for invalid configuration
 */
export function createContainer(provider: IConfigProvider = new EnvConfigProvider()): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Configuration ───────────────────────────────────────────────────
  container.registerSingleton(Tokens.IConfigProvider, () => provider);
  container.registerSingleton(Tokens.Configuration, (c) => loadConfiguration(c.resolve(Tokens.IConfigProvider)));

  const config = container.resolve(Tokens.Configuration);
  Logger.initialize(config.logging);

  // ─── Logging ─────────────────────────────────────────────────────────
  container.registerSingleton(Tokens.ILogger, () => Logger.for('scheduler'));

  // ─── Scheduler ───────────────────────────────────────────────────────
  container.registerSingleton(Tokens.IJobScheduler, (c) => {
    const { scheduler } = c.resolve(Tokens.Configuration);
    return new JobScheduler({
      name: scheduler.name,
      maxConcurrency: scheduler.maxConcurrency,
      logger: c.resolve(Tokens.ILogger),
    });
  });

  Logger.for('composition').debug('Container created');
  return container;
}
