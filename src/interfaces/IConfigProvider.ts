/**
 * @fileoverview Interface for configuration access abstraction.
 *
 * Decouples configuration lookup from its source (environment variables,
 * an in-memory map in tests) so configuration loading can be unit tested.
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Source of raw configuration values.
 *
 * Values are returned as stored: an environment-backed provider hands back
 * strings, an in-memory provider whatever it was given. Typing, coercion and
 * defaults are applied by `loadConfiguration`.
 *
 * @example
 * ```typescript
 * const provider = new EnvConfigProvider();
 * provider.getConfig('jobkit.scheduler', 'maxConcurrency'); // '4' or undefined
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a raw configuration value.
   *
   * @param section - Configuration section (e.g. `jobkit.scheduler`)
   * @param key - Configuration key within the section
   * @returns The stored value, or `undefined` when not set
   */
  getConfig(section: string, key: string): unknown;
}
